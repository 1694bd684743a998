import { DocumentKind, DocumentKindName } from '../types';
import { CREDIT_NOTE_TYPE_CODE, INVOICE_TYPE_CODE, UBL_NAMESPACES } from '../constants';

export const INVOICE_KIND: DocumentKind = {
  name: 'invoice',
  rootElement: 'Invoice',
  namespace: UBL_NAMESPACES.INVOICE,
  typeCodeElement: 'cbc:InvoiceTypeCode',
  typeCode: INVOICE_TYPE_CODE,
  lineElement: 'cac:InvoiceLine',
  quantityElement: 'cbc:InvoicedQuantity',
  hasDueDate: true,
  hasLineTaxTotal: true,
  attachmentDescription: 'Invoice',
};

// UBL 2.1 credit notes carry no header due date
export const CREDIT_NOTE_KIND: DocumentKind = {
  name: 'creditNote',
  rootElement: 'CreditNote',
  namespace: UBL_NAMESPACES.CREDIT_NOTE,
  typeCodeElement: 'cbc:CreditNoteTypeCode',
  typeCode: CREDIT_NOTE_TYPE_CODE,
  lineElement: 'cac:CreditNoteLine',
  quantityElement: 'cbc:CreditedQuantity',
  hasDueDate: false,
  hasLineTaxTotal: false,
  attachmentDescription: 'CreditNote',
};

export const DOCUMENT_KINDS: Readonly<Record<DocumentKindName, DocumentKind>> = {
  invoice: INVOICE_KIND,
  creditNote: CREDIT_NOTE_KIND,
};
