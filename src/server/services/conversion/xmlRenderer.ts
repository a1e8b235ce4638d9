/**
 * XML renderings of extracted document text
 */

import { Builder } from 'xml2js';
import type { CurriculumSection } from './curriculumStructure.js';

export interface RenderedPage {
  pageNumber: number;
  text: string;
}

const XML_DECLARATION = { version: '1.0', encoding: 'UTF-8' };
const RENDER_OPTIONS = { pretty: true, indent: '  ', newline: '\n' };

function createBuilder(rootName: string): Builder {
  return new Builder({ rootName, xmldec: XML_DECLARATION, renderOpts: RENDER_OPTIONS });
}

/**
 * `<document>` with one `<page>` per PDF page; reserved characters are
 * escaped by the builder
 */
export function renderDocumentXml(source: string, pages: RenderedPage[]): string {
  const builder = createBuilder('document');
  return `${builder.buildObject({
    $: { source, pages: pages.length },
    page: pages.map((page) => ({ $: { number: page.pageNumber }, _: page.text })),
  })}\n`;
}

function sectionAttributes(section: CurriculumSection): Record<string, string | number> {
  const attributes: Record<string, string | number> = {
    index: section.index,
    kind: section.kind,
    title: section.title,
  };
  if (section.semester !== undefined) {
    attributes.semester = section.semester;
  }
  return attributes;
}

/**
 * `<curriculum>` with one `<section>` per detected section
 */
export function renderStructuredXml(source: string, sections: CurriculumSection[]): string {
  const builder = createBuilder('curriculum');
  return `${builder.buildObject({
    $: { source, sections: sections.length },
    section: sections.map((section) => ({
      $: sectionAttributes(section),
      line: section.lines,
      discipline: section.disciplines.map((discipline) => ({
        $: {
          title: discipline.title,
          credits: discipline.credits,
          hours: discipline.hours,
          semester: discipline.semester,
        },
      })),
    })),
  })}\n`;
}
