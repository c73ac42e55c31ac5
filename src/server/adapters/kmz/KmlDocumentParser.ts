/**
 * KmlDocumentParser - Parse KML into a namespaced element tree
 *
 * xml2js is run with explicit, order-preserving children and namespace
 * resolution so placemarks can be listed in document order regardless of how
 * deeply folders nest them. The raw xml2js output is normalized into
 * `KmlNode` values before anything else touches it.
 */

import { TextDecoder } from 'node:util';
import { parseStringPromise } from 'xml2js';
import { createChildLogger } from '../../utils/logger.js';
import { MalformedDocumentError, getErrorMessage } from '../../types/errors.js';

const logger = createChildLogger({ component: 'KmlDocumentParser' });

export const KML_NAMESPACE = 'http://www.opengis.net/kml/2.2';

const CHILDREN_KEY = '$$';
const TEXT_KEY = '_';
const NAME_KEY = '#name';
const NAMESPACE_KEY = '$ns';

/**
 * Element of a parsed KML document
 */
export interface KmlNode {
  /** Qualified tag name as written in the source */
  name: string;
  localName: string;
  namespace: string;
  /** Concatenated character data of the element itself, untrimmed */
  text: string;
  children: KmlNode[];
}

export interface KmlDocumentParserOptions {
  namespace?: string;
}

/**
 * Parsed document with the queries the extractor needs
 */
export class KmlDocument {
  constructor(
    readonly root: KmlNode,
    private readonly namespace: string = KML_NAMESPACE
  ) {}

  /**
   * All Placemark elements, in document order
   */
  placemarks(): KmlNode[] {
    const found: KmlNode[] = [];
    const visit = (node: KmlNode): void => {
      if (this.matches(node, 'Placemark')) {
        found.push(node);
      }
      for (const child of node.children) {
        visit(child);
      }
    };
    visit(this.root);
    return found;
  }

  /**
   * Trimmed text of the first direct child with the given local name
   */
  childText(node: KmlNode, localName: string): string | undefined {
    const child = node.children.find((candidate) => this.matches(candidate, localName));
    return child ? child.text.trim() : undefined;
  }

  /**
   * Trimmed text of the first descendant (depth first) with the given local name
   */
  descendantText(node: KmlNode, localName: string): string | undefined {
    for (const child of node.children) {
      if (this.matches(child, localName)) {
        return child.text.trim();
      }
      const nested = this.descendantText(child, localName);
      if (nested !== undefined) {
        return nested;
      }
    }
    return undefined;
  }

  private matches(node: KmlNode, localName: string): boolean {
    return node.localName === localName && node.namespace === this.namespace;
  }
}

export class KmlDocumentParser {
  private readonly namespace: string;

  constructor(options: KmlDocumentParserOptions = {}) {
    this.namespace = options.namespace || KML_NAMESPACE;
  }

  /**
   * Parse KML content
   *
   * Buffers are decoded by their byte order mark, else by the encoding named
   * in the XML declaration, else as UTF-8.
   *
   * @throws MalformedDocumentError if the content is empty, in an unknown
   * encoding or not well-formed XML
   */
  async parse(content: string | Buffer): Promise<KmlDocument> {
    const xml = typeof content === 'string' ? content : decodeDocument(content);

    let parsed: unknown;
    try {
      parsed = await parseStringPromise(xml, {
        explicitRoot: true,
        explicitChildren: true,
        preserveChildrenOrder: true,
        explicitCharkey: true,
        charsAsChildren: false,
        ignoreAttrs: true,
        xmlns: true,
        trim: false,
        normalize: false,
      });
    } catch (error) {
      throw new MalformedDocumentError(`KML document could not be parsed: ${getErrorMessage(error)}`);
    }

    const rootElement = extractRoot(parsed);
    if (!rootElement) {
      throw new MalformedDocumentError('KML document is empty');
    }

    const root = toKmlNode(rootElement);
    const document = new KmlDocument(root, this.namespace);

    logger.debug({ root: root.name, namespace: root.namespace }, 'Parsed KML document');

    return document;
  }
}

const XML_DECLARATION_ENCODING = /^\s*<\?xml[^>]*?\sencoding\s*=\s*["']([A-Za-z0-9._:-]+)["']/;

function detectEncoding(content: Buffer): string {
  if (content[0] === 0xef && content[1] === 0xbb && content[2] === 0xbf) {
    return 'utf-8';
  }
  if (content[0] === 0xff && content[1] === 0xfe) {
    return 'utf-16le';
  }
  if (content[0] === 0xfe && content[1] === 0xff) {
    return 'utf-16be';
  }
  // the declaration itself is ASCII in every encoding it can name here
  const head = content.subarray(0, 256).toString('latin1');
  return XML_DECLARATION_ENCODING.exec(head)?.[1] ?? 'utf-8';
}

function decodeDocument(content: Buffer): string {
  const encoding = detectEncoding(content);
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding);
  } catch (error) {
    throw new MalformedDocumentError(`Unsupported KML document encoding '${encoding}'`, {
      encoding,
      reason: getErrorMessage(error),
    });
  }
  return decoder.decode(content);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractRoot(parsed: unknown): Record<string, unknown> | undefined {
  if (!isRecord(parsed)) {
    return undefined;
  }
  const [rootValue] = Object.values(parsed);
  return isRecord(rootValue) ? rootValue : undefined;
}

function toKmlNode(element: Record<string, unknown>): KmlNode {
  const rawName = element[NAME_KEY];
  const rawText = element[TEXT_KEY];
  const ns = element[NAMESPACE_KEY];

  const name = typeof rawName === 'string' ? rawName : '';
  const localName = isRecord(ns) && typeof ns.local === 'string' ? ns.local : stripPrefix(name);
  const namespace = isRecord(ns) && typeof ns.uri === 'string' ? ns.uri : '';
  const text = typeof rawText === 'string' ? rawText : '';

  const rawChildren = element[CHILDREN_KEY];
  const children = Array.isArray(rawChildren)
    ? rawChildren.filter(isRecord).map((child) => toKmlNode(child))
    : [];

  return { name, localName, namespace, text, children };
}

function stripPrefix(name: string): string {
  const separator = name.indexOf(':');
  return separator === -1 ? name : name.slice(separator + 1);
}
