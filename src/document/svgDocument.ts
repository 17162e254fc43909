import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { InvalidDocumentError } from '../errors.js';
import type { CarrierDocument, CarrierElement } from '../types/index.js';
import { expandInternalSubset, restoreInternalSubset } from './internalSubset.js';

/**
 * DOCTYPE system identifiers accepted as SVG documents
 */
export const SVG_SYSTEM_IDS: readonly string[] = [
  'http://www.w3.org/Graphics/SVG/1.1/DTD/svg11.dtd',
  'http://www.w3.org/TR/2001/REC-SVG-20010904/DTD/svg10.dtd',
];

const DOCUMENT_TYPE_NODE = 10;

function isDocumentType(node: Node): node is DocumentType {
  return node.nodeType === DOCUMENT_TYPE_NODE;
}

// Some xmldom releases keep the quotes around DOCTYPE literals
function unquote(value: string): string {
  return value.replace(/^["']|["']$/g, '');
}

function findDoctype(doc: Document): DocumentType | null {
  for (let i = 0; i < doc.childNodes.length; i++) {
    const node = doc.childNodes.item(i);
    if (node && isDocumentType(node)) {
      return node;
    }
  }
  return null;
}

class SvgElement implements CarrierElement {
  constructor(
    private readonly element: Element,
    readonly index: number,
  ) {}

  get tagName(): string {
    return this.element.tagName;
  }

  getAttribute(name: string): string | null {
    return this.element.hasAttribute(name) ? this.element.getAttribute(name) : null;
  }

  setAttribute(name: string, value: string): void {
    this.element.setAttribute(name, value);
  }
}

/**
 * Parsed SVG tree. Attribute writes go straight to the DOM, so they are
 * visible to later reads and to `serialize()`.
 */
export class SvgDocument implements CarrierDocument {
  private elements: SvgElement[] | null = null;

  private constructor(
    private readonly doc: Document,
    readonly systemId: string,
    private readonly internalSubset: string | null,
  ) {}

  /**
   * Parse SVG text, rejecting malformed XML and unknown document types
   */
  static parse(text: string, source?: string): SvgDocument {
    const expanded = expandInternalSubset(text, source);
    const problems: string[] = [];
    const record = (msg: unknown) => {
      problems.push(String(msg).trim());
    };

    let doc: Document;
    try {
      doc = new DOMParser({
        locator: {},
        errorHandler: { warning: record, error: record, fatalError: record },
      }).parseFromString(expanded.text, 'text/xml');
    } catch (error) {
      throw new InvalidDocumentError(
        error instanceof Error ? error.message : 'markup could not be parsed',
        source,
      );
    }

    if (problems.length > 0) {
      throw new InvalidDocumentError(problems[0] ?? 'malformed markup', source);
    }
    if (!doc || !doc.documentElement) {
      throw new InvalidDocumentError('no root element', source);
    }

    const doctype = findDoctype(doc);
    if (!doctype || !doctype.systemId) {
      throw new InvalidDocumentError('missing SVG document type declaration', source);
    }

    const systemId = unquote(doctype.systemId);
    if (!SVG_SYSTEM_IDS.includes(systemId)) {
      throw new InvalidDocumentError(`unrecognized document type ${systemId}`, source);
    }

    return new SvgDocument(doc, systemId, expanded.subset);
  }

  /**
   * Elements whose tag is in `tagNames`, in document order. Each element's
   * `index` is its position among all elements of the document.
   */
  elementsByTagName(tagNames: Iterable<string>): CarrierElement[] {
    const wanted = new Set(tagNames);
    return this.allElements().filter(el => wanted.has(el.tagName));
  }

  serialize(): string {
    return restoreInternalSubset(new XMLSerializer().serializeToString(this.doc), this.internalSubset);
  }

  private allElements(): SvgElement[] {
    if (this.elements) return this.elements;

    const all = this.doc.getElementsByTagName('*');
    const elements: SvgElement[] = [];
    for (let i = 0; i < all.length; i++) {
      const element = all.item(i);
      if (element) {
        elements.push(new SvgElement(element, i));
      }
    }
    this.elements = elements;
    return elements;
  }
}
