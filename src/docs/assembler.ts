import type {
  CategoryGroup,
  InheritanceChain,
  Member,
  Section,
  SectionKind,
  TypeDescriptor,
} from '../types.js';

/**
 * Presentation order of sections. Navigation anchors and tables of contents
 * depend on it, so it never varies with the data.
 */
export const SECTION_ORDER: readonly SectionKind[] = [
  'properties',
  'methods',
  'fields',
  'events',
  'derivedTypes',
  'seeAlso',
  'globalSettings',
  'inheritance',
];

export const SECTION_TITLES: Readonly<Record<SectionKind, string>> = {
  properties: 'Properties',
  methods: 'Methods',
  fields: 'Fields',
  events: 'Events',
  derivedTypes: 'Derived Types',
  seeAlso: 'See Also',
  globalSettings: 'Global Settings',
  inheritance: 'Inheritance',
};

export function sectionAnchor(kind: SectionKind): string {
  return kind.replace(/([A-Z])/g, '-$1').toLowerCase();
}

export function participatesInInheritance(descriptor: TypeDescriptor): boolean {
  return descriptor.baseChain.length > 0 || descriptor.children.length > 0;
}

export function inheritanceChain(descriptor: TypeDescriptor): InheritanceChain {
  return {
    ancestors: [...descriptor.baseChain].reverse(),
    typeName: descriptor.typeName,
    descendants: descriptor.children.map((child) => child.typeName),
  };
}

type SectionsByKind = { [K in SectionKind]?: Extract<Section, { kind: K }> };

function nonEmpty<T>(items: readonly T[]): readonly T[] | undefined {
  return items.length > 0 ? items : undefined;
}

function sectionsByKind(descriptor: TypeDescriptor): SectionsByKind {
  const sections: SectionsByKind = {};
  const properties = nonEmpty(descriptor.properties);
  const methods = nonEmpty(descriptor.methods);
  const fields = nonEmpty(descriptor.fields);
  const events = nonEmpty(descriptor.events);
  const children = nonEmpty(descriptor.children);
  const links = nonEmpty(descriptor.links);
  const globalSettings = nonEmpty(descriptor.globalSettings);

  if (properties) sections.properties = { kind: 'properties', members: properties };
  if (methods) sections.methods = { kind: 'methods', members: methods };
  if (fields) sections.fields = { kind: 'fields', members: fields };
  if (events) sections.events = { kind: 'events', members: events };
  if (children) sections.derivedTypes = { kind: 'derivedTypes', types: children };
  // Duplicates are kept: the same target may be linked from different contexts
  if (links) sections.seeAlso = { kind: 'seeAlso', links };
  if (globalSettings) sections.globalSettings = { kind: 'globalSettings', members: globalSettings };
  if (participatesInInheritance(descriptor)) {
    sections.inheritance = { kind: 'inheritance', hierarchy: inheritanceChain(descriptor) };
  }
  return sections;
}

/**
 * Lay out the documentation sections of a type.
 *
 * Only sections with content are returned, always in {@link SECTION_ORDER}.
 * Member lists are passed through in source order.
 */
export function assembleSections(descriptor: TypeDescriptor): Section[] {
  const available = sectionsByKind(descriptor);
  const sections: Section[] = [];
  for (const kind of SECTION_ORDER) {
    const section = available[kind];
    if (section) {
      sections.push(section);
    }
  }
  return sections;
}

function hasCategory(member: Member): member is Member & { category: string } {
  return member.category !== undefined && member.category.trim() !== '';
}

/**
 * Partition members by category.
 *
 * Groups appear in the order their category is first seen. Uncategorized
 * members form one unlabeled group after all labeled ones.
 */
export function groupByCategory(members: readonly Member[]): CategoryGroup[] {
  const groups = new Map<string, Member[]>();
  const uncategorized: Member[] = [];

  for (const member of members) {
    if (!hasCategory(member)) {
      uncategorized.push(member);
      continue;
    }
    const group = groups.get(member.category);
    if (group) {
      group.push(member);
    } else {
      groups.set(member.category, [member]);
    }
  }

  const result: CategoryGroup[] = Array.from(groups, ([category, grouped]) => ({
    category,
    members: grouped,
  }));
  if (uncategorized.length > 0) {
    result.push({ members: uncategorized });
  }
  return result;
}

/**
 * Member table groups for a section. Global settings are never grouped.
 */
export function groupSectionMembers(section: Section): CategoryGroup[] {
  switch (section.kind) {
    case 'properties':
    case 'methods':
    case 'fields':
    case 'events':
      return groupByCategory(section.members);
    case 'globalSettings':
      return section.members.length > 0 ? [{ members: section.members }] : [];
    default:
      return [];
  }
}

/**
 * Whether a member shown on the page of `typeName` is declared by an ancestor
 */
export function isInherited(member: Member, typeName: string): boolean {
  return member.declaringType !== typeName;
}
