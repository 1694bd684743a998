/**
 * Content based MIME type detection
 *
 * Attachments given as a file path get their MIME code from the leading bytes
 * of the file, never from the extension.
 */

const OCTET_STREAM = 'application/octet-stream';
const PLAIN_TEXT = 'text/plain; charset=utf-8';

// Magic number signatures for the attachment types Peppol accepts, plus a few common ones
const FILE_SIGNATURES: { mimeType: string; signature: number[]; offset?: number }[] = [
  // PDF: %PDF-
  { mimeType: 'application/pdf', signature: [0x25, 0x50, 0x44, 0x46, 0x2d] },
  // PNG: 89 50 4E 47 0D 0A 1A 0A
  { mimeType: 'image/png', signature: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  // JPEG: FF D8 FF
  { mimeType: 'image/jpeg', signature: [0xff, 0xd8, 0xff] },
  // GIF87a / GIF89a
  { mimeType: 'image/gif', signature: [0x47, 0x49, 0x46, 0x38, 0x37, 0x61] },
  { mimeType: 'image/gif', signature: [0x47, 0x49, 0x46, 0x38, 0x39, 0x61] },
  // ZIP container (xlsx, ods, ...): PK 03 04
  { mimeType: 'application/zip', signature: [0x50, 0x4b, 0x03, 0x04] },
  // WebP: "WEBP" after the RIFF header
  { mimeType: 'image/webp', signature: [0x57, 0x45, 0x42, 0x50], offset: 8 },
];

const UTF8_BOM = [0xef, 0xbb, 0xbf];

/**
 * Checks if a byte sequence in the buffer matches a given signature at an offset
 */
function matchesSignature(content: Uint8Array, signature: number[], offset = 0): boolean {
  if (content.length < offset + signature.length) {
    return false;
  }
  return signature.every((byte, i) => content[offset + i] === byte);
}

/**
 * Tab, line feed, carriage return and printable ASCII; UTF-8 continuation bytes are let through
 */
function looksLikeText(content: Uint8Array, checkLength: number): boolean {
  const length = Math.min(content.length, checkLength);
  for (let i = 0; i < length; i++) {
    const byte = content[i];
    const isControl = byte < 0x20 && byte !== 0x09 && byte !== 0x0a && byte !== 0x0d;
    if (isControl || byte === 0x7f) {
      return false;
    }
  }
  return true;
}

/**
 * Detect the MIME type of a payload from its leading bytes
 *
 * @param content - File content
 * @returns Detected MIME type, `application/octet-stream` when nothing matches
 */
export function detectMimeType(content: Uint8Array): string {
  if (content.length === 0) {
    return PLAIN_TEXT;
  }

  const match = FILE_SIGNATURES.find((entry) => matchesSignature(content, entry.signature, entry.offset));
  if (match) {
    if (match.mimeType === 'image/webp' && !matchesSignature(content, [0x52, 0x49, 0x46, 0x46])) {
      return OCTET_STREAM;
    }
    return match.mimeType;
  }

  const body = matchesSignature(content, UTF8_BOM) ? content.subarray(UTF8_BOM.length) : content;
  const head = Buffer.from(body.subarray(0, 512)).toString('utf8').trimStart();

  if (head.startsWith('<?xml')) {
    return 'text/xml; charset=utf-8';
  }
  if (/^<!doctype html|^<html/i.test(head)) {
    return 'text/html; charset=utf-8';
  }

  return looksLikeText(body, 512) ? PLAIN_TEXT : OCTET_STREAM;
}
