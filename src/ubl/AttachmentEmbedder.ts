import fs from 'fs';
import path from 'path';
import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces';
import { AttachmentReader, DocumentInput, DocumentKind, DocumentReference } from '../types';
import { ATTACHMENT_CLASSIFICATION_DESCRIPTION, ATTACHMENT_CLASSIFICATION_ID, PDF_MIME_TYPE } from '../constants';
import { PeppolAttachmentError } from '../errors';
import { tryCatch } from '../tryCatch';
import { detectMimeType } from '../utils/mimeSniffer';

/**
 * Reads attachments from the local file system
 */
export const fileSystemAttachmentReader: AttachmentReader = {
  readFile: (filePath) => fs.readFileSync(filePath),
  detectMimeType,
};

/**
 * Build the document references for an embedded payload
 *
 * Always two references: the business-document classification, then the
 * reference carrying the payload.
 *
 * @param documentId Document number, used as id of the payload reference
 * @param content Raw bytes, or a string that is already base64
 * @param mimeCode MIME type of the payload
 * @param filename Filename attribute
 * @param description Payload description
 */
export function embedAttachmentData(
  documentId: string,
  content: string | Buffer,
  mimeCode: string,
  filename: string,
  description: string
): DocumentReference[] {
  return [
    { id: ATTACHMENT_CLASSIFICATION_ID, description: ATTACHMENT_CLASSIFICATION_DESCRIPTION },
    {
      id: documentId,
      description,
      attachment: {
        content: typeof content === 'string' ? content : content.toString('base64'),
        mimeCode,
        filename,
      },
    },
  ];
}

/**
 * Read an attachment from a file, detect its MIME type from the content and embed it
 *
 * @throws {PeppolAttachmentError} If the file cannot be read
 */
export function embedAttachmentFile(
  documentId: string,
  filePath: string,
  description: string,
  reader: AttachmentReader = fileSystemAttachmentReader
): DocumentReference[] {
  const { data, error } = tryCatch(() => reader.readFile(filePath));

  if (error) {
    throw new PeppolAttachmentError(`add attachment failed: ${error.message}`, { cause: error });
  }

  return embedAttachmentData(documentId, data, reader.detectMimeType(data), path.basename(filePath), description);
}

/**
 * Decide which attachment, if any, the document carries
 *
 * Inline data wins over a file path; with neither there are no references.
 */
export function resolveAttachment(
  kind: DocumentKind,
  input: DocumentInput,
  reader?: AttachmentReader
): DocumentReference[] {
  if (input.pdfData && input.pdfData.length > 0) {
    return embedAttachmentData(
      input.documentNumber,
      input.pdfData,
      PDF_MIME_TYPE,
      input.pdfFilename || `${input.documentNumber}.pdf`,
      input.pdfDescription || kind.attachmentDescription
    );
  }

  if (input.pdfFilename) {
    return embedAttachmentFile(input.documentNumber, input.pdfFilename, kind.attachmentDescription, reader);
  }

  return [];
}

/**
 * Write cac:AdditionalDocumentReference elements
 */
export function appendDocumentReferencesXml(root: XMLBuilder, references: DocumentReference[]): void {
  references.forEach((reference) => {
    const referenceElement = root
      .ele('cac:AdditionalDocumentReference')
      .ele('cbc:ID')
      .txt(reference.id)
      .up()
      .ele('cbc:DocumentDescription')
      .txt(reference.description)
      .up();

    if (reference.attachment) {
      referenceElement
        .ele('cac:Attachment')
        .ele('cbc:EmbeddedDocumentBinaryObject', {
          mimeCode: reference.attachment.mimeCode,
          filename: reference.attachment.filename,
        })
        .txt(reference.attachment.content)
        .up()
        .up();
    }
  });
}
