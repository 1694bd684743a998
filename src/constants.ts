/**
 * Document-level constants for Peppol BIS Billing 3.0 (UBL 2.1)
 */

export const UBL_NAMESPACES = {
  INVOICE: 'urn:oasis:names:specification:ubl:schema:xsd:Invoice-2',
  CREDIT_NOTE: 'urn:oasis:names:specification:ubl:schema:xsd:CreditNote-2',
  CAC: 'urn:oasis:names:specification:ubl:schema:xsd:CommonAggregateComponents-2',
  CBC: 'urn:oasis:names:specification:ubl:schema:xsd:CommonBasicComponents-2',
} as const;

export const PEPPOL_CUSTOMIZATION_ID = 'urn:cen.eu:en16931:2017#compliant#urn:fdc:peppol.eu:2017:poacc:billing:3.0';
export const PEPPOL_PROFILE_ID = 'urn:fdc:peppol.eu:2017:poacc:billing:01:1.0';

export const INVOICE_TYPE_CODE = '380';
export const CREDIT_NOTE_TYPE_CODE = '381';

/** Days between issue date and due date on invoices */
export const PAYMENT_DUE_DAYS = 30;

/** Single-currency model */
export const DOCUMENT_CURRENCY = 'EUR';

/** UN/ECE Rec 20 "mutually defined", the model does not track units of measure */
export const UNSPECIFIED_UNIT_CODE = 'ZZ';

/** UNCL4461 "instrument not defined" */
export const DEFAULT_PAYMENT_MEANS_CODE = '1';

export const VAT_SCHEME_ID = 'VAT';

export const DEFAULT_TAX_CATEGORY_ID = 'S';
export const DEFAULT_TAX_CATEGORY_NAME = 'Standard rated';

export const INTRA_COMMUNITY_CATEGORY_ID = 'K';
export const INTRA_COMMUNITY_EXEMPTION_CODE = 'VATEX-EU-IC';
export const INTRA_COMMUNITY_EXEMPTION_REASON = 'Intra-community supply';

// Business-document classification reference emitted ahead of an embedded attachment
export const ATTACHMENT_CLASSIFICATION_ID = 'UBL.BE';
export const ATTACHMENT_CLASSIFICATION_DESCRIPTION = 'CommercialInvoice';
export const PDF_MIME_TYPE = 'application/pdf';

/** Peppol participant identifiers are "<scheme>:<value>" with a four character scheme */
export const PEPPOL_SCHEME_LENGTH = 4;
export const PEPPOL_ID_SEPARATOR = ':';

// Validation service
export const DEFAULT_TIMEOUT = 30000;
export const VALIDATOR_URL_ENV = 'PEPPOL_VALIDATOR_URL';
export const MALFORMED_XML_MESSAGE = 'Malformed xml document';
