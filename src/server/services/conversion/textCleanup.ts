/**
 * Normalisation of raw PDF text before it is written or segmented
 */

const SINGLE_LETTER = /^\p{L}$/u;
// Characters XML 1.0 cannot carry; PDFs emit them for form feeds and broken glyphs
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;
const UNPAIRED_SURROGATES = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * A line made only of single-letter tokens ("a b c") is extraction noise,
 * typically vertical headers or watermark glyphs
 */
function isNoiseLine(line: string): boolean {
  const tokens = line.split(/\s+/);
  return tokens.length > 0 && tokens.every((token) => SINGLE_LETTER.test(token));
}

/**
 * Trim lines, drop noise, collapse runs of blank lines into one and strip
 * leading and trailing blank lines
 */
export function cleanLines(lines: Iterable<string>): string[] {
  const cleaned: string[] = [];
  for (const raw of lines) {
    const line = raw.replace(INVALID_XML_CHARS, '').replace(UNPAIRED_SURROGATES, '').replace(/\u00a0/g, ' ').trim();
    if (line.length === 0) {
      if (cleaned.length > 0 && cleaned[cleaned.length - 1] !== '') {
        cleaned.push('');
      }
      continue;
    }
    if (isNoiseLine(line)) continue;
    cleaned.push(line);
  }
  while (cleaned.length > 0 && cleaned[cleaned.length - 1] === '') {
    cleaned.pop();
  }
  return cleaned;
}

/**
 * Clean a block of text; the result ends with a single newline, or is empty
 * when nothing but whitespace and noise was found
 */
export function cleanText(raw: string): string {
  const lines = cleanLines(raw.split(/\r?\n/));
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
