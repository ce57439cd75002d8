import boxen from 'boxen';
import chalk from 'chalk';
import { formatSection } from '../shared/cli-sections.js';
import { SECTION_TITLES, groupSectionMembers, isInherited } from './assembler.js';
import type { DocumentationPage, InheritanceChain, Member, Section } from '../types.js';

/**
 * Terminal rendering of a page for `uidocs show`
 */
export function renderPageTerminal(page: DocumentationPage): string {
  const header = page.summary
    ? `${chalk.bold(page.typeName)}\n${chalk.dim(page.summary)}`
    : chalk.bold(page.typeName);

  const lines = [
    boxen(header, { padding: { left: 1, right: 1 }, borderStyle: 'round', borderColor: 'gray' }),
    '',
  ];

  if (page.sections.length === 0) {
    lines.push(chalk.dim('No documented members.'));
    return lines.join('\n');
  }

  for (const section of page.sections) {
    lines.push(...formatSection(SECTION_TITLES[section.kind], sectionLines(section, page.typeName)));
  }
  return lines.join('\n').trimEnd();
}

export function sectionLines(section: Section, typeName: string): string[] {
  switch (section.kind) {
    case 'properties':
    case 'methods':
    case 'fields':
    case 'events':
    case 'globalSettings':
      return groupSectionMembers(section).flatMap((group) => [
        ...(group.category !== undefined ? [`  ${chalk.cyan(group.category)}`] : []),
        ...group.members.map((member) => memberLine(member, typeName)),
      ]);
    case 'derivedTypes':
      return section.types.map((type) =>
        type.summary ? `  • ${type.typeName} ${chalk.dim(type.summary)}` : `  • ${type.typeName}`
      );
    case 'seeAlso':
      return section.links.map((link) => `  → ${link.targetTypeName}`);
    case 'inheritance':
      return hierarchyLines(section.hierarchy);
  }
}

function memberLine(member: Member, typeName: string): string {
  const parts = [`    • ${member.name}`];
  if (member.type) {
    parts.push(chalk.yellow(member.type));
  }
  if (member.defaultValue) {
    parts.push(chalk.dim(`= ${member.defaultValue}`));
  }
  if (isInherited(member, typeName)) {
    parts.push(chalk.dim(`(from ${member.declaringType})`));
  }
  if (member.summary) {
    parts.push(chalk.dim(`- ${member.summary}`));
  }
  return parts.join(' ');
}

function hierarchyLines(hierarchy: InheritanceChain): string[] {
  const lines = hierarchy.ancestors.map((ancestor, depth) => treeLine(depth, ancestor));
  const depth = hierarchy.ancestors.length;
  lines.push(treeLine(depth, chalk.bold(hierarchy.typeName)));
  for (const descendant of hierarchy.descendants) {
    lines.push(treeLine(depth + 1, descendant));
  }
  return lines;
}

function treeLine(depth: number, label: string): string {
  return depth === 0 ? `  ${label}` : `  ${'   '.repeat(depth - 1)}└─ ${label}`;
}
