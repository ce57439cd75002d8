import * as fs from 'fs/promises';
import { ValidationError, getErrorMessage, tryAsync } from '../shared/error-handler.js';
import { createLogger, type Logger } from '../shared/logger.js';
import {
  assertArray,
  assertObject,
  assertString,
  isString,
  optionalArray,
  optionalString,
} from '../shared/validation.js';
import type { Member, MemberKind, SeeAlsoLink, TypeDescriptor } from '../types.js';

/**
 * Member list keys of a manifest entry and the member kind each implies
 */
const MEMBER_LISTS = {
  properties: 'property',
  methods: 'method',
  fields: 'field',
  events: 'event',
  globalSettings: 'globalSetting',
} as const satisfies Record<string, MemberKind>;

type MemberListKey = keyof typeof MEMBER_LISTS;

interface DescriptorDraft {
  typeName: string;
  summary?: string;
  baseChain: string[];
  explicitChildren: string[];
  links: SeeAlsoLink[];
  members: Record<MemberListKey, Member[]>;
}

interface MutableDescriptor extends TypeDescriptor {
  children: TypeDescriptor[];
}

export interface TypeCatalogOptions {
  logger?: Logger;
}

/**
 * Resolves type names to descriptors.
 *
 * Built once from the manifest emitted by the extraction step. Descriptors are
 * frozen after construction, and `children` hold references to the other
 * descriptors of the same catalog.
 */
export class TypeCatalog {
  private readonly types: ReadonlyMap<string, TypeDescriptor>;

  private constructor(types: ReadonlyMap<string, TypeDescriptor>) {
    this.types = types;
  }

  static async load(filePath: string, options: TypeCatalogOptions = {}): Promise<TypeCatalog> {
    const log = options.logger ?? createLogger({ scope: 'catalog' });
    const raw = await tryAsync(
      () => fs.readFile(filePath, 'utf-8'),
      'Reading descriptor manifest'
    );

    let manifest: unknown;
    try {
      manifest = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(
        `Descriptor manifest is not valid JSON: ${getErrorMessage(error)}`,
        { path: filePath },
        'Regenerate the manifest with the extraction step'
      );
    }

    const catalog = TypeCatalog.fromManifest(manifest, { logger: log });
    log.debug('Loaded descriptor manifest', { path: filePath, types: catalog.size });
    return catalog;
  }

  static fromManifest(manifest: unknown, options: TypeCatalogOptions = {}): TypeCatalog {
    const log = options.logger ?? createLogger({ scope: 'catalog' });

    assertObject(manifest, 'manifest');
    assertArray(manifest.types, 'manifest.types');

    const drafts = new Map<string, DescriptorDraft>();
    manifest.types.forEach((entry, index) => {
      const draft = parseEntry(entry, `manifest.types[${index}]`);
      if (drafts.has(draft.typeName)) {
        throw new ValidationError(
          `Duplicate type name in manifest: ${draft.typeName}`,
          { typeName: draft.typeName, index },
          'Each type may be described only once'
        );
      }
      drafts.set(draft.typeName, draft);
    });

    const nodes = new Map<string, MutableDescriptor>();
    for (const draft of drafts.values()) {
      nodes.set(draft.typeName, {
        typeName: draft.typeName,
        summary: draft.summary,
        properties: Object.freeze(draft.members.properties),
        methods: Object.freeze(draft.members.methods),
        fields: Object.freeze(draft.members.fields),
        events: Object.freeze(draft.members.events),
        globalSettings: Object.freeze(draft.members.globalSettings),
        children: [],
        links: Object.freeze(draft.links),
        baseChain: Object.freeze(draft.baseChain),
      });
    }

    for (const [typeName, childNames] of collectChildNames(drafts)) {
      const node = nodes.get(typeName);
      if (!node) continue;
      for (const childName of childNames) {
        const child = nodes.get(childName);
        if (child) {
          node.children.push(child);
        } else {
          log.warn('Ignoring unknown child type', { typeName, child: childName });
        }
      }
    }

    for (const node of nodes.values()) {
      Object.freeze(node.children);
      Object.freeze(node);
    }

    return new TypeCatalog(nodes);
  }

  /**
   * Look up a type. Absence is a normal outcome, not an error.
   */
  resolve(typeName: string): TypeDescriptor | undefined {
    return this.types.get(typeName);
  }

  has(typeName: string): boolean {
    return this.types.has(typeName);
  }

  get size(): number {
    return this.types.size;
  }

  /**
   * Type names in manifest order
   */
  typeNames(): string[] {
    return Array.from(this.types.keys());
  }

  descriptors(): TypeDescriptor[] {
    return Array.from(this.types.values());
  }
}

/**
 * Explicitly listed children first, then catalog types whose nearest ancestor
 * is the type, without duplicates. A type is never its own child.
 */
function collectChildNames(drafts: ReadonlyMap<string, DescriptorDraft>): Map<string, string[]> {
  const childNames = new Map<string, Set<string>>();
  for (const draft of drafts.values()) {
    const explicit = draft.explicitChildren.filter((name) => name !== draft.typeName);
    childNames.set(draft.typeName, new Set(explicit));
  }
  for (const draft of drafts.values()) {
    const parent = draft.baseChain[0];
    if (parent !== undefined && parent !== draft.typeName) {
      childNames.get(parent)?.add(draft.typeName);
    }
  }
  return new Map(Array.from(childNames, ([typeName, names]) => [typeName, Array.from(names)]));
}

function parseEntry(entry: unknown, path: string): DescriptorDraft {
  assertObject(entry, path);
  assertString(entry.typeName, `${path}.typeName`);
  const typeName = entry.typeName;
  const source: Record<string, unknown> = entry;

  const memberList = (key: MemberListKey): Member[] =>
    optionalArray(source, key, path).map((item, index) =>
      parseMember(item, `${path}.${key}[${index}]`, MEMBER_LISTS[key], typeName)
    );

  return {
    typeName,
    summary: optionalString(entry, 'summary', path),
    baseChain: parseNames(optionalArray(entry, 'baseChain', path), `${path}.baseChain`),
    explicitChildren: parseNames(optionalArray(entry, 'children', path), `${path}.children`),
    links: optionalArray(entry, 'links', path).map((item, index) =>
      parseLink(item, `${path}.links[${index}]`)
    ),
    members: {
      properties: memberList('properties'),
      methods: memberList('methods'),
      fields: memberList('fields'),
      events: memberList('events'),
      globalSettings: memberList('globalSettings'),
    },
  };
}

function parseMember(item: unknown, path: string, kind: MemberKind, owner: string): Member {
  assertObject(item, path);
  assertString(item.name, `${path}.name`);

  return {
    name: item.name,
    kind,
    category: optionalString(item, 'category', path),
    declaringType: optionalString(item, 'declaringType', path) ?? owner,
    type: optionalString(item, 'type', path),
    summary: optionalString(item, 'summary', path),
    defaultValue: optionalString(item, 'defaultValue', path),
  };
}

/**
 * Links are either bare type names or `{ targetTypeName }` objects
 */
function parseLink(item: unknown, path: string): SeeAlsoLink {
  if (isString(item)) {
    return { targetTypeName: item };
  }
  assertObject(item, path);
  assertString(item.targetTypeName, `${path}.targetTypeName`);
  return { targetTypeName: item.targetTypeName };
}

function parseNames(items: unknown[], path: string): string[] {
  return items.map((item, index) => {
    assertString(item, `${path}[${index}]`);
    return item;
  });
}
