/**
 * Documentation model types
 *
 * Descriptors are produced by an external extraction step and supplied as a
 * JSON manifest. Once the catalog builds them they are frozen and may be
 * shared across any number of page builds.
 */

export type MemberKind = 'property' | 'method' | 'field' | 'event' | 'globalSetting';

export interface Member {
  readonly name: string;
  readonly kind: MemberKind;
  /** Curator-assigned label such as "Behavior" or "Appearance" */
  readonly category?: string;
  readonly declaringType: string;
  readonly type?: string;
  readonly summary?: string;
  readonly defaultValue?: string;
}

export interface SeeAlsoLink {
  readonly targetTypeName: string;
}

export interface TypeDescriptor {
  readonly typeName: string;
  readonly summary?: string;
  readonly properties: readonly Member[];
  readonly methods: readonly Member[];
  readonly fields: readonly Member[];
  readonly events: readonly Member[];
  readonly globalSettings: readonly Member[];
  /** Direct known subtypes. Shared nodes of the type graph, not copies. */
  readonly children: readonly TypeDescriptor[];
  readonly links: readonly SeeAlsoLink[];
  /** Ancestor type names, nearest ancestor first and root-most last. */
  readonly baseChain: readonly string[];
}

export type MemberSectionKind = 'properties' | 'methods' | 'fields' | 'events';

export interface MemberSection {
  readonly kind: MemberSectionKind;
  readonly members: readonly Member[];
}

export interface PropertiesSection extends MemberSection {
  readonly kind: 'properties';
}

export interface MethodsSection extends MemberSection {
  readonly kind: 'methods';
}

export interface FieldsSection extends MemberSection {
  readonly kind: 'fields';
}

export interface EventsSection extends MemberSection {
  readonly kind: 'events';
}

export interface DerivedTypesSection {
  readonly kind: 'derivedTypes';
  readonly types: readonly TypeDescriptor[];
}

export interface SeeAlsoSection {
  readonly kind: 'seeAlso';
  readonly links: readonly SeeAlsoLink[];
}

export interface GlobalSettingsSection {
  readonly kind: 'globalSettings';
  readonly members: readonly Member[];
}

export interface InheritanceChain {
  /** Ancestors root-most first, ending with the direct base type */
  readonly ancestors: readonly string[];
  readonly typeName: string;
  readonly descendants: readonly string[];
}

export interface InheritanceSection {
  readonly kind: 'inheritance';
  readonly hierarchy: InheritanceChain;
}

export type Section =
  | PropertiesSection
  | MethodsSection
  | FieldsSection
  | EventsSection
  | DerivedTypesSection
  | SeeAlsoSection
  | GlobalSettingsSection
  | InheritanceSection;

export type SectionKind = Section['kind'];

export interface CategoryGroup {
  /** undefined for the unlabeled trailing group */
  readonly category?: string;
  readonly members: readonly Member[];
}

export interface TableOfContentsEntry {
  readonly anchor: string;
  readonly title: string;
}

export interface DocumentationPage {
  readonly typeName: string;
  readonly summary?: string;
  readonly sections: readonly Section[];
  readonly toc: readonly TableOfContentsEntry[];
}
