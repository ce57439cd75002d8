import { SECTION_TITLES, groupSectionMembers, isInherited } from './assembler.js';
import type {
  CategoryGroup,
  DocumentationPage,
  InheritanceChain,
  Member,
  Section,
  SeeAlsoLink,
  TypeDescriptor,
} from '../types.js';

export interface MarkdownOptions {
  /** Target of a link to another type's page. Defaults to `<TypeName>.md`. */
  linkFor?: (typeName: string) => string;
  /** Emit the contents list after the summary. Defaults to true. */
  includeToc?: boolean;
}

/**
 * Render a documentation page as Markdown
 */
export function renderPageMarkdown(page: DocumentationPage, options: MarkdownOptions = {}): string {
  const linkFor = options.linkFor ?? pageFileName;
  const lines: string[] = [`# ${escapeText(page.typeName)}`, ''];

  if (page.summary) {
    lines.push(page.summary, '');
  }

  if ((options.includeToc ?? true) && page.toc.length > 0) {
    lines.push('## Contents', '');
    for (const entry of page.toc) {
      lines.push(`- [${entry.title}](#${entry.anchor})`);
    }
    lines.push('');
  }

  for (const section of page.sections) {
    lines.push(`## ${SECTION_TITLES[section.kind]}`, '');
    lines.push(...renderSectionBody(section, page.typeName, linkFor), '');
  }

  return lines.join('\n').trimEnd() + '\n';
}

function renderSectionBody(
  section: Section,
  typeName: string,
  linkFor: (typeName: string) => string
): string[] {
  switch (section.kind) {
    case 'properties':
    case 'methods':
    case 'fields':
    case 'events':
    case 'globalSettings':
      return renderGroups(groupSectionMembers(section), typeName);
    case 'derivedTypes':
      return renderDerivedTypes(section.types, linkFor);
    case 'seeAlso':
      return renderLinks(section.links, linkFor);
    case 'inheritance':
      return renderHierarchy(section.hierarchy, linkFor);
  }
}

function renderGroups(groups: CategoryGroup[], typeName: string): string[] {
  const lines: string[] = [];
  groups.forEach((group, index) => {
    if (index > 0) {
      lines.push('');
    }
    if (group.category !== undefined) {
      lines.push(`### ${group.category}`, '');
    }
    lines.push(...renderMemberTable(group.members, typeName));
  });
  return lines;
}

function renderMemberTable(members: readonly Member[], typeName: string): string[] {
  const rows = members.map((member) => {
    const name = isInherited(member, typeName)
      ? `${member.name} (from ${member.declaringType})`
      : member.name;
    return tableRow([name, member.type ?? '', member.defaultValue ?? '', member.summary ?? '']);
  });
  return [tableRow(['Name', 'Type', 'Default', 'Description']), '| --- | --- | --- | --- |', ...rows];
}

function renderDerivedTypes(
  types: readonly TypeDescriptor[],
  linkFor: (typeName: string) => string
): string[] {
  const rows = types.map((type) =>
    tableRow([link(type.typeName, linkFor), type.summary ?? ''])
  );
  return [tableRow(['Name', 'Description']), '| --- | --- |', ...rows];
}

function renderLinks(links: readonly SeeAlsoLink[], linkFor: (typeName: string) => string): string[] {
  return links.map((entry) => `- ${link(entry.targetTypeName, linkFor)}`);
}

function renderHierarchy(
  hierarchy: InheritanceChain,
  linkFor: (typeName: string) => string
): string[] {
  const lines = hierarchy.ancestors.map(
    (ancestor, depth) => `${indent(depth)}- ${link(ancestor, linkFor)}`
  );
  const depth = hierarchy.ancestors.length;
  lines.push(`${indent(depth)}- **${escapeText(hierarchy.typeName)}**`);
  for (const descendant of hierarchy.descendants) {
    lines.push(`${indent(depth + 1)}- ${link(descendant, linkFor)}`);
  }
  return lines;
}

function indent(depth: number): string {
  return '  '.repeat(depth);
}

function link(typeName: string, linkFor: (typeName: string) => string): string {
  return `[${escapeText(typeName)}](${linkFor(typeName)})`;
}

function tableRow(cells: string[]): string {
  return `| ${cells.map(escapeCell).join(' | ')} |`;
}

/**
 * Angle brackets of generic names would otherwise be read as HTML tags
 */
function escapeText(text: string): string {
  return text.replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function escapeCell(text: string): string {
  return escapeText(text).replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

/**
 * File name of a type's page. Characters that are not allowed in file names,
 * path separators included, become `_`, and so do leading dots, so the page
 * always lands directly inside the output directory.
 */
export function pageFileName(typeName: string): string {
  const safe = typeName
    .replace(/[\\/:*?"<>|\x00-\x1f]/g, '_')
    .replace(/^\.+/, (dots) => '_'.repeat(dots.length));
  return `${safe || '_'}.md`;
}
