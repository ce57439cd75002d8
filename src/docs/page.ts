import { SECTION_TITLES, assembleSections, sectionAnchor } from './assembler.js';
import type { TypeCatalog } from './catalog.js';
import type {
  DerivedTypesSection,
  DocumentationPage,
  Section,
  TableOfContentsEntry,
  TypeDescriptor,
} from '../types.js';

export function tableOfContents(sections: readonly Section[]): TableOfContentsEntry[] {
  return sections.map((section) => ({
    anchor: sectionAnchor(section.kind),
    title: SECTION_TITLES[section.kind],
  }));
}

export function buildDocumentationPage(descriptor: TypeDescriptor): DocumentationPage {
  const sections = assembleSections(descriptor);
  return {
    typeName: descriptor.typeName,
    summary: descriptor.summary,
    sections,
    toc: tableOfContents(sections),
  };
}

/**
 * Build the page for a type name, or undefined when the catalog does not know
 * the type. Callers render their own not-found state for that case.
 */
export function resolveDocumentationPage(
  catalog: TypeCatalog,
  typeName: string
): DocumentationPage | undefined {
  const descriptor = catalog.resolve(typeName);
  return descriptor ? buildDocumentationPage(descriptor) : undefined;
}

export type SectionData =
  | Exclude<Section, DerivedTypesSection>
  | { kind: 'derivedTypes'; types: Array<{ typeName: string; summary?: string }> };

/**
 * Plain JSON form of a page. Derived types are reduced to name and summary,
 * matching what a type table displays.
 */
export function pageToData(page: DocumentationPage): {
  typeName: string;
  summary?: string;
  toc: readonly TableOfContentsEntry[];
  sections: SectionData[];
} {
  return {
    typeName: page.typeName,
    summary: page.summary,
    toc: page.toc,
    sections: page.sections.map((section): SectionData =>
      section.kind === 'derivedTypes'
        ? {
            kind: 'derivedTypes',
            types: section.types.map((type) => ({ typeName: type.typeName, summary: type.summary })),
          }
        : section
    ),
  };
}
