import { describe, it, expect } from 'vitest';
import { parseStringPromise } from 'xml2js';
import { renderDocumentXml, renderStructuredXml } from '../../../../../src/server/services/conversion/xmlRenderer.js';
import { splitSections } from '../../../../../src/server/services/conversion/curriculumStructure.js';
import { cleanText } from '../../../../../src/server/services/conversion/textCleanup.js';

describe('xmlRenderer', () => {
  describe('renderDocumentXml', () => {
    it('writes one page element per page and escapes reserved characters', async () => {
      const xml = renderDocumentXml('plan.pdf', [
        { pageNumber: 1, text: 'A & B <c>' },
        { pageNumber: 2, text: 'second' },
      ]);

      expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<document source="plan.pdf" pages="2">')).toBe(true);
      expect(xml.endsWith('</document>\n')).toBe(true);
      expect(xml).toContain('A &amp; B &lt;c&gt;');

      const parsed = await parseStringPromise(xml);
      expect(parsed).toEqual({
        document: {
          $: { source: 'plan.pdf', pages: '2' },
          page: [
            { _: 'A & B <c>', $: { number: '1' } },
            { _: 'second', $: { number: '2' } },
          ],
        },
      });
    });

    it('renders text that held a lone surrogate once it is cleaned', async () => {
      const xml = renderDocumentXml('p.pdf', [{ pageNumber: 1, text: cleanText('Учебный план \uD800 текст').trimEnd() }]);

      const parsed = await parseStringPromise(xml);
      expect(parsed.document.page).toEqual([{ _: 'Учебный план  текст', $: { number: '1' } }]);
    });
  });

  describe('renderStructuredXml', () => {
    it('renders sections with their lines and disciplines', async () => {
      const sections = splitSections(['Intro & notes', '1 семестр', 'Курс "A" 3 108 1']);
      const xml = renderStructuredXml('plan.pdf', sections);

      const parsed = await parseStringPromise(xml);
      expect(parsed.curriculum.$).toEqual({ source: 'plan.pdf', sections: '2' });
      expect(parsed.curriculum.section[0].$).toEqual({ index: '0', kind: 'preamble', title: 'Preamble' });
      expect(parsed.curriculum.section[0].line).toEqual(['Intro & notes']);
      expect(parsed.curriculum.section[1].$).toEqual({ index: '1', kind: 'heading', title: '1 семестр', semester: '1' });
      expect(parsed.curriculum.section[1].discipline).toEqual([
        { $: { title: 'Курс "A"', credits: '3', hours: '108', semester: '1' } },
      ]);
    });
  });
});
