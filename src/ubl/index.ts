/**
 * UBL (Universal Business Language) Module
 *
 * This module provides functionality for generating UBL 2.1 invoices and
 * credit notes compliant with Peppol BIS Billing 3.0.
 */

export { assembleDocument, buildCreditNoteXml, buildInvoiceXml, buildUblDocument, serializeDocument } from './DocumentBuilder';
export { buildLine, calculateLineAmounts } from './LineBuilder';
export type { LineAmounts } from './LineBuilder';
export { aggregateTaxes, calculateMonetaryTotals } from './TaxAggregator';
export { resolveTaxCategory, TAX_CATEGORY_POLICIES } from './taxCategory';
export type { TaxCategoryPolicy } from './taxCategory';
export { embedAttachmentData, embedAttachmentFile, fileSystemAttachmentReader } from './AttachmentEmbedder';
export { CREDIT_NOTE_KIND, DOCUMENT_KINDS, INVOICE_KIND } from './documentKinds';

// Re-export types for convenience
export type { InvoiceInput, CreditNoteInput, DocumentInput, InvoiceLine, Party, Address } from '../types';
