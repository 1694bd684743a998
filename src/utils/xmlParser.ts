import { create } from 'xmlbuilder2';
import { XMLValidator } from 'fast-xml-parser';
import { DocumentKindName, UblDocumentSummary, ValidationMessage, ValidationResult } from '../types';
import { PeppolXmlParsingError } from '../errors';
import { tryCatch } from '../tryCatch';

/**
 * Reads XML back into plain data
 *
 * Used to summarize generated UBL documents for reconciliation and to read the
 * reports returned by validation services (JSON or Schematron SVRL).
 */

type XmlNode = { [key: string]: unknown };

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Object literals and parsed JSON only, buffers and other class instances are not reports */
function isPlainObject(value: unknown): value is XmlNode {
  if (!isXmlNode(value)) {
    return false;
  }
  // Object.prototype of any realm
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === null || Object.getPrototypeOf(prototype) === null;
}

function asList(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Children of an element with the given name
 *
 * xmlbuilder2 groups consecutive siblings under one key and puts
 * interleaved ones in a '#' list, both are looked at.
 */
function childrenNamed(node: unknown, name: string): unknown[] {
  if (!isXmlNode(node)) {
    return [];
  }

  const direct = asList(node[name]);
  const interleaved = asList(node['#'])
    .filter(isXmlNode)
    .flatMap((entry) => asList(entry[name]));

  return [...direct, ...interleaved];
}

function firstChild(node: unknown, ...path: string[]): unknown {
  return path.reduce<unknown>((current, name) => childrenNamed(current, name)[0], node);
}

/**
 * Text content of an element, whether it was read as a plain string or as
 * an object carrying attributes
 */
function textOf(value: unknown): string {
  if (typeof value === 'string' || typeof value === 'number') {
    return String(value);
  }
  if (isXmlNode(value) && (typeof value['#'] === 'string' || typeof value['#'] === 'number')) {
    return String(value['#']);
  }
  return '';
}

function attributeOf(value: unknown, name: string): string | undefined {
  if (!isXmlNode(value)) {
    return undefined;
  }
  const attribute = value[`@${name}`];
  return typeof attribute === 'string' ? attribute : undefined;
}

function amountOf(node: unknown, ...path: string[]): number {
  const text = textOf(firstChild(node, ...path));
  return text ? parseFloat(text) : 0;
}

/**
 * Collect every element with a local name, at any depth
 */
function collectElements(value: unknown, localName: string, found: unknown[] = []): unknown[] {
  if (Array.isArray(value)) {
    value.forEach((entry) => collectElements(entry, localName, found));
    return found;
  }
  if (!isXmlNode(value)) {
    return found;
  }

  Object.entries(value).forEach(([key, child]) => {
    if (key.startsWith('@')) {
      return;
    }
    if (key === localName || key.endsWith(`:${localName}`)) {
      found.push(...asList(child));
    }
    collectElements(child, localName, found);
  });

  return found;
}

function parseXmlToObject(xmlString: string): XmlNode {
  if (!isWellFormedXml(xmlString)) {
    throw new PeppolXmlParsingError('Failed to parse XML document', xmlString);
  }

  const { data, error } = tryCatch(() => create(xmlString).end({ format: 'object' }));

  if (error || !isXmlNode(data)) {
    throw new PeppolXmlParsingError('Failed to parse XML document', xmlString);
  }

  return data;
}

/**
 * Whether a string is a well-formed XML document
 */
export function isWellFormedXml(xmlString: string): boolean {
  if (!xmlString?.trim()) {
    return false;
  }
  return XMLValidator.validate(xmlString.trim()) === true;
}

/**
 * Read a UBL invoice or credit note back into a summary of its totals
 *
 * @param xmlString UBL document
 * @returns Document summary
 * @throws {PeppolXmlParsingError} If XML cannot be parsed or is neither an invoice nor a credit note
 */
export function parseUblDocument(xmlString: string): UblDocumentSummary {
  const doc = parseXmlToObject(xmlString);

  let kind: DocumentKindName;
  let root: unknown;
  let lineElement: string;

  if (doc.Invoice !== undefined) {
    kind = 'invoice';
    root = doc.Invoice;
    lineElement = 'cac:InvoiceLine';
  } else if (doc.CreditNote !== undefined) {
    kind = 'creditNote';
    root = doc.CreditNote;
    lineElement = 'cac:CreditNoteLine';
  } else {
    throw new PeppolXmlParsingError('Unknown or unexpected XML document structure', xmlString);
  }

  const taxTotal = firstChild(root, 'cac:TaxTotal');
  const dueDate = textOf(firstChild(root, 'cbc:DueDate'));

  return {
    kind,
    id: textOf(firstChild(root, 'cbc:ID')),
    issueDate: textOf(firstChild(root, 'cbc:IssueDate')),
    dueDate: dueDate || undefined,
    currency: textOf(firstChild(root, 'cbc:DocumentCurrencyCode')),
    taxAmount: amountOf(taxTotal, 'cbc:TaxAmount'),
    subtotals: childrenNamed(taxTotal, 'cac:TaxSubtotal').map((subtotal) => ({
      categoryId: textOf(firstChild(subtotal, 'cac:TaxCategory', 'cbc:ID')),
      percent: amountOf(subtotal, 'cac:TaxCategory', 'cbc:Percent'),
      taxableAmount: amountOf(subtotal, 'cbc:TaxableAmount'),
      taxAmount: amountOf(subtotal, 'cbc:TaxAmount'),
    })),
    lineExtensionAmount: amountOf(root, 'cac:LegalMonetaryTotal', 'cbc:LineExtensionAmount'),
    taxExclusiveAmount: amountOf(root, 'cac:LegalMonetaryTotal', 'cbc:TaxExclusiveAmount'),
    taxInclusiveAmount: amountOf(root, 'cac:LegalMonetaryTotal', 'cbc:TaxInclusiveAmount'),
    payableAmount: amountOf(root, 'cac:LegalMonetaryTotal', 'cbc:PayableAmount'),
    lineCount: childrenNamed(root, lineElement).length,
    attachmentCount: childrenNamed(root, 'cac:AdditionalDocumentReference').filter(
      (reference) => firstChild(reference, 'cac:Attachment') !== undefined
    ).length,
  };
}

/**
 * Schematron SVRL report: every svrl:failed-assert is a finding, fatal ones fail the document
 *
 * <svrl:failed-assert id="BR-CO-15" flag="fatal" location="/Invoice">
 *   <svrl:text>Invoice total amount with VAT = ...</svrl:text>
 * </svrl:failed-assert>
 */
function parseSvrlReport(xmlString: string): ValidationResult {
  const doc = parseXmlToObject(xmlString);

  const messages: ValidationMessage[] = collectElements(doc, 'failed-assert').map((assertion) => ({
    rule: attributeOf(assertion, 'id'),
    flag: attributeOf(assertion, 'flag') ?? 'fatal',
    message: collectElements(assertion, 'text').map(textOf).join(' ').trim(),
  }));

  const valid = !messages.some((message) => isBlocking(message.flag));
  return { valid, details: describe(valid, messages), messages };
}

function isBlocking(flag?: string): boolean {
  return flag === undefined || flag === 'fatal' || flag === 'error';
}

function describe(valid: boolean, messages: ValidationMessage[]): string {
  if (messages.length === 0) {
    return `Validation ${valid ? 'passed' : 'failed'}`;
  }
  return messages.map((message) => (message.rule ? `[${message.rule}] ${message.message}` : message.message)).join('\n');
}

function toValidationMessage(entry: unknown): ValidationMessage | null {
  if (typeof entry === 'string') {
    return { message: entry };
  }
  if (!isXmlNode(entry)) {
    return null;
  }

  const message = entry.message ?? entry.text;
  if (typeof message !== 'string') {
    return null;
  }

  const rule = entry.rule ?? entry.id;
  const flag = entry.flag ?? entry.severity;
  return {
    rule: typeof rule === 'string' ? rule : undefined,
    flag: typeof flag === 'string' ? flag.toLowerCase() : undefined,
    message,
  };
}

/**
 * JSON report: { valid?: boolean, success?: boolean, messages?: [...], errors?: [...] }
 */
function parseJsonReport(report: XmlNode): ValidationResult {
  const messages = [...asList(report.messages), ...asList(report.errors)]
    .map(toValidationMessage)
    .filter((message): message is ValidationMessage => message !== null);

  let valid: boolean;
  if (typeof report.valid === 'boolean') {
    valid = report.valid;
  } else if (typeof report.success === 'boolean') {
    valid = report.success;
  } else {
    valid = !messages.some((message) => isBlocking(message.flag));
  }

  return { valid, details: describe(valid, messages), messages };
}

/**
 * Parse the response of a validation service
 *
 * @param body Parsed JSON object, or the raw response text (JSON or SVRL XML)
 * @returns Validation result
 * @throws {PeppolXmlParsingError} If the response has an unexpected structure
 */
export function parseValidationResponse(body: unknown): ValidationResult {
  if (isPlainObject(body)) {
    return parseJsonReport(body);
  }

  if (typeof body === 'string') {
    const trimmed = body.trim();

    if (trimmed.startsWith('{')) {
      const { data, error } = tryCatch((): unknown => JSON.parse(trimmed));
      if (error || !isPlainObject(data)) {
        throw new PeppolXmlParsingError('Failed to parse JSON response', body);
      }
      return parseJsonReport(data);
    }

    if (trimmed.startsWith('<')) {
      return parseSvrlReport(trimmed);
    }
  }

  throw new PeppolXmlParsingError('Unknown or unexpected validation response structure', String(body));
}
