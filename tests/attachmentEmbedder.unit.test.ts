import {
  embedAttachmentData,
  embedAttachmentFile,
  fileSystemAttachmentReader,
  resolveAttachment,
} from '../src/ubl/AttachmentEmbedder';
import { CREDIT_NOTE_KIND, INVOICE_KIND } from '../src/ubl/documentKinds';
import { PeppolAttachmentError } from '../src/errors';
import { detectMimeType } from '../src/utils/mimeSniffer';
import { createInvoiceInput, createMemoryAttachmentReader, testFileUtils } from './testUtils';

describe('MIME type detection', () => {
  test.each<[string, number[], string]>([
    ['PDF', [0x25, 0x50, 0x44, 0x46, 0x2d, 0x31, 0x2e, 0x34], 'application/pdf'],
    ['PNG', [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00], 'image/png'],
    ['JPEG', [0xff, 0xd8, 0xff, 0xe0], 'image/jpeg'],
    ['GIF', [0x47, 0x49, 0x46, 0x38, 0x39, 0x61], 'image/gif'],
    ['ZIP', [0x50, 0x4b, 0x03, 0x04, 0x14], 'application/zip'],
    ['WebP', [0x52, 0x49, 0x46, 0x46, 0x00, 0x00, 0x00, 0x00, 0x57, 0x45, 0x42, 0x50], 'image/webp'],
    ['WEBP marker without RIFF', [0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x57, 0x45, 0x42, 0x50], 'application/octet-stream'],
    ['binary', [0x00, 0x01, 0x02, 0x03], 'application/octet-stream'],
  ])('detects %s', (_name, bytes, mimeType) => {
    expect(detectMimeType(Uint8Array.from(bytes))).toBe(mimeType);
  });

  test('detects text formats', () => {
    expect(detectMimeType(Buffer.from('<?xml version="1.0"?><a/>'))).toBe('text/xml; charset=utf-8');
    expect(detectMimeType(Buffer.from('\uFEFF<?xml version="1.0"?><a/>'))).toBe('text/xml; charset=utf-8');
    expect(detectMimeType(Buffer.from('<!DOCTYPE html><html></html>'))).toBe('text/html; charset=utf-8');
    expect(detectMimeType(Buffer.from('Plain notes\nsecond line'))).toBe('text/plain; charset=utf-8');
    expect(detectMimeType(Buffer.alloc(0))).toBe('text/plain; charset=utf-8');
  });
});

describe('Attachment embedding', () => {
  test('builds the classification reference followed by the payload reference', () => {
    expect(embedAttachmentData('INV-1', Buffer.from('hello'), 'text/plain', 'note.txt', 'Invoice')).toEqual([
      { id: 'UBL.BE', description: 'CommercialInvoice' },
      {
        id: 'INV-1',
        description: 'Invoice',
        attachment: { content: 'aGVsbG8=', mimeCode: 'text/plain', filename: 'note.txt' },
      },
    ]);
  });

  test('uses string content as already encoded', () => {
    const [, payload] = embedAttachmentData('INV-1', 'aGVsbG8=', 'text/plain', 'note.txt', 'Invoice');

    expect(payload.attachment?.content).toBe('aGVsbG8=');
  });

  test('reads a file, detects its type and keeps only the base name', () => {
    const reader = createMemoryAttachmentReader({ 'docs/scan.png': Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]) });

    const [, payload] = embedAttachmentFile('INV-1', 'docs/scan.png', 'Invoice', reader);

    expect(payload.attachment).toEqual({ content: 'iVBORw0KGgo=', mimeCode: 'image/png', filename: 'scan.png' });
  });

  test('wraps read failures', () => {
    const reader = createMemoryAttachmentReader({});

    expect(() => embedAttachmentFile('INV-1', 'missing.pdf', 'Invoice', reader)).toThrow(PeppolAttachmentError);
    expect(() => embedAttachmentFile('INV-1', 'missing.pdf', 'Invoice', reader)).toThrow(
      "add attachment failed: ENOENT: no such file or directory, open 'missing.pdf'"
    );
  });

  test('reads from the file system by default', () => {
    expect(() => embedAttachmentFile('INV-1', '/nonexistent/peppol-test/attachment.pdf', 'Invoice')).toThrow(
      PeppolAttachmentError
    );
    expect(fileSystemAttachmentReader.detectMimeType).toBe(detectMimeType);
  });
});

describe('Attachment resolution', () => {
  test('returns no references without attachment data', () => {
    expect(resolveAttachment(INVOICE_KIND, createInvoiceInput())).toEqual([]);
  });

  test('prefers inline data over a file name', () => {
    const reader = createMemoryAttachmentReader({});

    const references = resolveAttachment(
      CREDIT_NOTE_KIND,
      createInvoiceInput({ pdfData: testFileUtils.createPdfBuffer(), pdfFilename: 'copy.pdf' }),
      reader
    );

    expect(reader.readFile).not.toHaveBeenCalled();
    expect(references[1]).toEqual({
      id: 'INV-2024-001',
      description: 'CreditNote',
      attachment: { content: 'JVBERi0xLjQKJXRlc3QK', mimeCode: 'application/pdf', filename: 'copy.pdf' },
    });
  });

  test('ignores empty inline data', () => {
    const reader = createMemoryAttachmentReader({ 'copy.pdf': testFileUtils.createPdfBuffer() });

    const references = resolveAttachment(INVOICE_KIND, createInvoiceInput({ pdfData: '', pdfFilename: 'copy.pdf' }), reader);

    expect(reader.readFile).toHaveBeenCalledWith('copy.pdf');
    expect(references[1].description).toBe('Invoice');
  });
});
