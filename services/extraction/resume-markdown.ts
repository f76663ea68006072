/**
 * Extracts resume data from Markdown laid out as:
 *
 *   # Full Name
 *   ## Personal Info       - **Label**: value or [text](url)
 *   ## Summary             one paragraph
 *   ## Skills              - Skill — 80%
 *   ## Certs & Education   - item or [item](url)
 *   ## Acknowledgments     - item or [item](url)
 *   ## Recent Experience   ### Title — Company, **Dates:** ..., paragraph, bullets
 *   ## Keywords            one line
 */
import { decodeHTML } from 'entities';
import { ExtractionError } from '@core/errors/ExtractionError';
import { extractorLogger as logger } from '@core/utils/logger';
import type {
  ExperienceBullet,
  ExperienceEntry,
  LinkItem,
  PersonalInfoItem,
  ResumeData,
  Skill
} from './types';

const LINK_PATTERN = /^\[(.+?)\]\((.+?)\)$/;
const PERSONAL_INFO_PATTERN = /^-\s+\*\*(.+?)\*\*:\s*(.+)$/;
const SKILL_PATTERNS = [/^(.+?)\s+—\s+(\d+)\s*%$/, /^(.+?)\s+-\s+(\d+)\s*%$/];
const DATES_PATTERN = /^\*\*Dates:\*\*\s*(.+)$/;
const BULLET_LEAD_PATTERN = /^\*\*(.+?)\*\*\s*(.+)$/;

/**
 * Markdown sources may keep entities such as `&amp;` or `&nbsp;`; decode
 * them so the renderer escapes the real characters exactly once.
 */
export function decodeEntities(text: string): string {
  return decodeHTML(text);
}

export function parseMarkdownLink(text: string): { text: string; href: string | null } {
  const trimmed = text.trim();
  const match = LINK_PATTERN.exec(trimmed);
  if (match) {
    return { text: decodeEntities(match[1].trim()), href: match[2].trim() };
  }
  return { text: decodeEntities(trimmed), href: null };
}

/**
 * Group lines under their `## ` heading. Lines before the first heading
 * are ignored; a repeated heading keeps its last block.
 */
export function collectSections(lines: string[]): Map<string, string[]> {
  const sections = new Map<string, string[]>();
  let current: string[] | undefined;

  for (const line of lines) {
    if (line.startsWith('## ')) {
      current = [];
      sections.set(line.slice(3).trim(), current);
    } else if (current) {
      current.push(line);
    }
  }

  return sections;
}

function listItems(lines: string[]): string[] {
  return lines
    .map(line => line.trim())
    .filter(line => line.startsWith('- '));
}

function paragraph(lines: string[]): string {
  return decodeEntities(
    lines
      .map(line => line.trim())
      .filter(line => line.length > 0)
      .join(' ')
  );
}

function parsePersonalInfo(lines: string[]): PersonalInfoItem[] {
  const items: PersonalInfoItem[] = [];
  for (const line of listItems(lines)) {
    const match = PERSONAL_INFO_PATTERN.exec(line);
    if (!match) continue;
    const { text, href } = parseMarkdownLink(match[2]);
    items.push({ label: decodeEntities(match[1].trim()), value: text, href });
  }
  return items;
}

function parseSkills(lines: string[]): Skill[] {
  const skills: Skill[] = [];
  for (const line of listItems(lines)) {
    const item = line.slice(2).trim();
    const match = SKILL_PATTERNS.map(pattern => pattern.exec(item)).find(result => result !== null);
    if (!match) continue;
    skills.push({ name: decodeEntities(match[1].trim()), percent: Number.parseInt(match[2], 10) });
  }
  return skills;
}

function parseLinkList(lines: string[]): LinkItem[] {
  return listItems(lines).map(line => {
    const { text, href } = parseMarkdownLink(line.slice(2));
    return href ? { text, href } : { text };
  });
}

function parseBullet(text: string): ExperienceBullet {
  const match = BULLET_LEAD_PATTERN.exec(text);
  if (match) {
    return { lead: decodeEntities(match[1].trim()), text: decodeEntities(match[2].trim()) };
  }
  return { lead: '', text: decodeEntities(text) };
}

/**
 * Each `### Title — Company` starts an entry, followed by an optional
 * `**Dates:**` line, a description paragraph and a bullet list.
 */
function parseExperience(lines: string[]): ExperienceEntry[] {
  const entries: ExperienceEntry[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i].trim();
    if (!line.startsWith('### ')) {
      i++;
      continue;
    }

    const header = line.slice(4).trim();
    const separator = header.indexOf(' — ');
    const title = separator === -1 ? header : header.slice(0, separator).trim();
    const company = separator === -1 ? '' : header.slice(separator + 3).trim();
    i++;

    while (i < lines.length && lines[i].trim() === '') {
      i++;
    }

    let dates = '';
    const datesMatch = i < lines.length ? DATES_PATTERN.exec(lines[i].trim()) : null;
    if (datesMatch) {
      dates = decodeEntities(datesMatch[1].trim());
      i++;
    }

    const description: string[] = [];
    while (i < lines.length) {
      const text = lines[i].trim();
      if (text.startsWith('### ') || text.startsWith('- ')) break;
      if (text) description.push(text);
      i++;
    }

    const bullets: ExperienceBullet[] = [];
    while (i < lines.length) {
      const text = lines[i].trim();
      if (text.startsWith('### ')) break;
      if (text.startsWith('- ')) {
        bullets.push(parseBullet(text.slice(2).trim()));
      }
      i++;
    }

    entries.push({
      dates,
      title: decodeEntities(title),
      company: decodeEntities(company),
      description: decodeEntities(description.join(' ')).trim(),
      bullets
    });
  }

  return entries;
}

/**
 * Extract resume data from Markdown. Throws ExtractionError when there is
 * no `# Name` heading.
 */
export function extractResume(markdown: string): ResumeData {
  const lines = markdown.split(/\r?\n/);
  const headingIndex = lines.findIndex(line => line.startsWith('# '));
  if (headingIndex === -1) {
    throw new ExtractionError("Could not find H1 '# Name' in content markdown.");
  }

  const fullName = lines[headingIndex].slice(2).trim();
  const nameParts = fullName.split(/\s+/).filter(part => part.length > 0);
  const sections = collectSections(lines.slice(headingIndex + 1));
  const section = (name: string): string[] => sections.get(name) ?? [];

  logger.debug('Collected resume sections', { sections: [...sections.keys()] });

  return {
    person: {
      full_name: fullName,
      first_name: nameParts[0] ?? '',
      last_name: nameParts.length > 1 ? nameParts[nameParts.length - 1] : ''
    },
    personal_info: parsePersonalInfo(section('Personal Info')),
    summary: paragraph(section('Summary')),
    skills: parseSkills(section('Skills')),
    certs_education: parseLinkList(section('Certs & Education')),
    acknowledgments: parseLinkList(section('Acknowledgments')),
    experience: parseExperience(section('Recent Experience')),
    keywords: paragraph(section('Keywords'))
  };
}
