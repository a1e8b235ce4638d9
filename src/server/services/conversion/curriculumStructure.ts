/**
 * Heading-based segmentation of curriculum text
 *
 * Every heading line opens a new section; lines before the first heading go
 * to a "preamble" section, which also stands in when there are no headings at
 * all. Section bodies are scanned for discipline rows (title followed by
 * credits, hours and semester).
 */

export type SectionKind = 'preamble' | 'heading';

export interface Discipline {
  title: string;
  credits: number;
  hours: number;
  semester: number;
}

export interface CurriculumSection {
  index: number;
  kind: SectionKind;
  title: string;
  semester?: number;
  lines: string[];
  disciplines: Discipline[];
}

export const PREAMBLE_TITLE = 'Preamble';

const BLOCK_HEADING = /^(?:блок|block)\s+\d+/iu;
const SEMESTER_PATTERNS = [
  /(\d{1,2})\s*(?:-?й\s*)?семестр/iu,
  /semester\s+(\d{1,2})/iu,
  /(\d{1,2})(?:st|nd|rd|th)?\s+semester/iu,
];
const NUMBERED_HEADING = /^\d{1,2}(?:\.\d{1,2})*\.?\s+\p{Lu}/u;
const SECTION_KEYWORDS = [
  'обязательные дисциплины',
  'пул выборных дисциплин',
  'практика по выбору',
  'универсальная (надпрофессиональная) подготовка',
  'государственная итоговая аттестация',
  'факультативные модули',
  'elective',
  'mandatory courses',
  'internship',
  'state final attestation',
];
const TOTAL_KEYWORDS = ['итог', 'всего', 'сумма', 'total'];
const MAX_WEAK_HEADING_LENGTH = 80;

const INTEGER_LINE = /^\d{1,4}$/;
const INLINE_DISCIPLINE = /^(.*\D)\s+(\d{1,4})\s+(\d{1,4})\s+(\d{1,2})$/u;

export function isTotalLine(line: string): boolean {
  const lower = line.toLowerCase();
  return TOTAL_KEYWORDS.some((keyword) => lower.includes(keyword));
}

export function headingSemester(line: string): number | undefined {
  for (const pattern of SEMESTER_PATTERNS) {
    const match = pattern.exec(line);
    if (match?.[1]) return parseInt(match[1], 10);
  }
  return undefined;
}

function parseInlineDiscipline(line: string): Discipline | null {
  const match = INLINE_DISCIPLINE.exec(line);
  if (!match) return null;
  const [, title = '', credits = '', hours = '', semester = ''] = match;
  if (!/\p{L}/u.test(title)) return null;
  return {
    title: title.trim(),
    credits: parseInt(credits, 10),
    hours: parseInt(hours, 10),
    semester: parseInt(semester, 10),
  };
}

function isUpperCaseHeading(line: string): boolean {
  if (line.length < 4) return false;
  const letters = line.match(/\p{L}/gu) ?? [];
  return letters.length >= 2 && !/\p{Ll}/u.test(line);
}

function isTitleText(line: string): boolean {
  return !INTEGER_LINE.test(line) && /\p{L}/u.test(line);
}

/**
 * A title line whose next three lines are credits, hours and semester
 */
function startsFourLineRow(line: string, following: readonly string[]): boolean {
  const numbers = following.slice(0, 3);
  return isTitleText(line) && numbers.length === 3 && numbers.every((n) => INTEGER_LINE.test(n));
}

/**
 * Decide whether a cleaned, non-empty line is a section heading; `following`
 * holds the non-empty lines after it
 */
export function isHeading(line: string, following: readonly string[] = []): boolean {
  const lower = line.toLowerCase();
  if (BLOCK_HEADING.test(line)) return true;
  if (headingSemester(line) !== undefined) return true;
  if (SECTION_KEYWORDS.some((keyword) => lower.includes(keyword))) return true;

  // Weaker shapes must not swallow totals or table rows
  if (
    line.length > MAX_WEAK_HEADING_LENGTH ||
    isTotalLine(line) ||
    parseInlineDiscipline(line) ||
    startsFourLineRow(line, following)
  ) {
    return false;
  }
  return NUMBERED_HEADING.test(line) || isUpperCaseHeading(line);
}

/**
 * Pull discipline rows out of a section body; the remaining lines are
 * returned in their original order. Text lines directly above a row are
 * joined into its title, since table cells wrap long names.
 */
export function extractDisciplines(body: string[]): { lines: string[]; disciplines: Discipline[] } {
  const lines: string[] = [];
  const disciplines: Discipline[] = [];
  let pending: string[] = [];

  const flush = (): void => {
    lines.push(...pending);
    pending = [];
  };
  const addRow = (row: Discipline): void => {
    disciplines.push({ ...row, title: [...pending, row.title].join(' ') });
    pending = [];
  };

  let i = 0;
  while (i < body.length) {
    const line = body[i] ?? '';
    if (isTotalLine(line)) {
      flush();
      lines.push(line);
      i++;
      continue;
    }

    const inline = parseInlineDiscipline(line);
    if (inline) {
      addRow(inline);
      i++;
      continue;
    }

    const following = body.slice(i + 1, i + 4);
    if (startsFourLineRow(line, following)) {
      const [credits = '', hours = '', semester = ''] = following;
      addRow({
        title: line,
        credits: parseInt(credits, 10),
        hours: parseInt(hours, 10),
        semester: parseInt(semester, 10),
      });
      i += 4;
      continue;
    }

    if (isTitleText(line)) {
      pending.push(line);
    } else {
      flush();
      lines.push(line);
    }
    i++;
  }
  flush();

  return { lines, disciplines };
}

/**
 * Split cleaned lines into heading-delimited sections
 */
export function splitSections(textLines: string[]): CurriculumSection[] {
  const drafts: Array<{ kind: SectionKind; title: string; semester?: number; body: string[] }> = [];
  let current: (typeof drafts)[number] | null = null;
  const content = textLines.filter((line) => line.length > 0);

  for (const [i, line] of content.entries()) {
    if (isHeading(line, content.slice(i + 1, i + 4))) {
      current = { kind: 'heading', title: line, semester: headingSemester(line), body: [] };
      drafts.push(current);
      continue;
    }

    if (!current) {
      current = { kind: 'preamble', title: PREAMBLE_TITLE, body: [] };
      drafts.push(current);
    }
    current.body.push(line);
  }

  if (drafts.length === 0) {
    drafts.push({ kind: 'preamble', title: PREAMBLE_TITLE, body: [] });
  }

  return drafts.map((draft, index) => {
    const { lines, disciplines } = extractDisciplines(draft.body);
    const section: CurriculumSection = { index, kind: draft.kind, title: draft.title, lines, disciplines };
    if (draft.semester !== undefined) section.semester = draft.semester;
    return section;
  });
}
