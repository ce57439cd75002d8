/**
 * uidocs
 *
 * Conditional class-name composition for UI components, and metadata-driven
 * API reference assembly
 */

export { CssBuilder, composeClasses, cx, type ClassFragment } from './css-builder.js';

export { Button, buttonClasses, startIconClasses, endIconClasses } from './components/button.js';
export {
  ButtonGroup,
  resolveFullWidth,
  type ButtonGroupMember,
  type ButtonGroupOptions,
} from './components/button-group.js';
export {
  configureButtonDefaults,
  getButtonDefaults,
  resetButtonDefaults,
  type ButtonDefaults,
} from './components/defaults.js';
export * from './components/types.js';

export {
  SECTION_ORDER,
  SECTION_TITLES,
  assembleSections,
  groupByCategory,
  groupSectionMembers,
  inheritanceChain,
  isInherited,
  participatesInInheritance,
  sectionAnchor,
} from './docs/assembler.js';
export { TypeCatalog, type TypeCatalogOptions } from './docs/catalog.js';
export {
  buildDocumentationPage,
  pageToData,
  resolveDocumentationPage,
  tableOfContents,
  type SectionData,
} from './docs/page.js';
export { renderPageMarkdown, pageFileName, type MarkdownOptions } from './docs/markdown.js';
export { renderPageTerminal } from './docs/terminal.js';
export * from './types.js';

export { resolveConfig, type CliOptions, type ResolvedConfig } from './config.js';
export { Logger, createLogger, type LogLevel, type LoggerOptions } from './shared/logger.js';
export {
  UiDocsError,
  ValidationError,
  FileSystemError,
  ConfigurationError,
} from './shared/error-handler.js';
