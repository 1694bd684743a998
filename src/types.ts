/**
 * Postal address. Every field except the country code may be left out,
 * a country-only address is valid for cross-border delivery locations.
 */
export interface Address {
  /** Street name and number */
  street?: string;
  /** City name */
  city?: string;
  /** Postal code */
  postalZone?: string;
  /** ISO 3166-1 alpha-2 country code */
  countryCode: string;
}

/**
 * Party information for suppliers and customers
 */
export interface Party {
  /** Trading name */
  name: string;
  /** Legal registration name (default: name) */
  registrationName?: string;
  /** VAT identifier, normalized before output */
  vatNumber: string;
  /**
   * Peppol participant identifier, "<scheme>:<value>" with a four character scheme
   * (e.g. "0208:0123456789")
   */
  peppolId: string;
  /** Party address */
  address: Address;
}

/**
 * Invoice or credit note line item
 */
export interface InvoiceLine {
  /** Item name */
  name: string;
  /** Item description */
  description?: string;
  /** Quantity */
  quantity: number;
  /** Unit price excluding VAT */
  unitPrice: number;
  /** VAT percentage (default: 0) */
  taxPercent?: number;
  /** Tax category code: S, Z, E, K, ... (default: 'S') */
  taxCategoryId?: string;
  /** Tax category display name (default: 'Standard rated') */
  taxCategoryName?: string;
  /** Exemption reason code, used by exempt categories such as K */
  taxExemptionReasonCode?: string;
  /** Exemption reason text, used by exempt categories such as K */
  taxExemptionReason?: string;
}

/**
 * Business-level description of an invoice or a credit note
 */
export interface DocumentInput {
  /** Document number, also used as order reference */
  documentNumber: string;
  /** Specification identifier (default: Peppol BIS Billing 3.0) */
  customizationId?: string;
  /** Business process identifier (default: Peppol billing profile 01) */
  profileId?: string;
  /** Reference assigned by the buyer */
  buyerReference?: string;
  /** Supplier information */
  supplier: Party;
  /** Customer information */
  customer: Party;
  /** Deliver-to address, required for intra-community supply */
  deliveryAddress?: Address;
  /** Actual delivery date, required for intra-community supply unless an invoicing period is given */
  actualDeliveryDate?: string | Date;
  /** Start of the invoicing period */
  invoicePeriodStart?: string | Date;
  /** End of the invoicing period */
  invoicePeriodEnd?: string | Date;
  /** Payee account (IBAN) */
  iban: string;
  /** Payee bank identifier (BIC) */
  bic?: string;
  /** UNCL4461 payment means code (default: '1') */
  paymentMeansCode?: string;
  /** Payment terms note */
  note?: string;
  /** Line items */
  lines: InvoiceLine[];
  /** PDF rendition of the document: a file path when no data is given, otherwise the attachment filename */
  pdfFilename?: string;
  /** PDF rendition of the document: a base64 string or raw bytes */
  pdfData?: string | Buffer;
  /** Description of the embedded PDF */
  pdfDescription?: string;
}

export type InvoiceInput = DocumentInput;
export type CreditNoteInput = DocumentInput;

/**
 * Closed set of document kinds produced by the builder
 */
export type DocumentKindName = 'invoice' | 'creditNote';

/**
 * Everything that differs between an invoice and a credit note
 */
export interface DocumentKind {
  name: DocumentKindName;
  rootElement: 'Invoice' | 'CreditNote';
  namespace: string;
  typeCodeElement: 'cbc:InvoiceTypeCode' | 'cbc:CreditNoteTypeCode';
  typeCode: string;
  lineElement: 'cac:InvoiceLine' | 'cac:CreditNoteLine';
  quantityElement: 'cbc:InvoicedQuantity' | 'cbc:CreditedQuantity';
  /** Whether cbc:DueDate is written in the header */
  hasDueDate: boolean;
  /** Whether each line carries its own cac:TaxTotal */
  hasLineTaxTotal: boolean;
  /** Description of an attachment read from a file */
  attachmentDescription: string;
}

/**
 * Effective tax treatment of a line after defaults and category policy
 */
export interface ResolvedTaxCategory {
  id: string;
  name: string;
  percent: number;
  exemptionReasonCode?: string;
  exemptionReason?: string;
}

/**
 * Output representation of one line
 */
export interface LineFragment {
  /** 1-based position in the input */
  id: string;
  quantity: number;
  unitCode: string;
  lineExtensionAmount: number;
  taxAmount: number;
  name: string;
  description?: string;
  unitPrice: number;
  taxCategory: ResolvedTaxCategory;
}

/**
 * Aggregated tax breakdown for one (category, rate) pair
 */
export interface TaxSubtotal {
  categoryId: string;
  categoryName: string;
  percent: number;
  rateBasisPoints: number;
  taxableAmount: number;
  taxAmount: number;
  exemptionReasonCode?: string;
  exemptionReason?: string;
}

export interface TaxAggregate {
  /** Sum of all line amounts before tax */
  lineExtensionAmount: number;
  /** Sum of all subtotal tax amounts */
  taxAmount: number;
  /** Sorted by category id, then rate */
  subtotals: TaxSubtotal[];
}

export interface MonetaryTotals {
  lineExtensionAmount: number;
  taxExclusiveAmount: number;
  taxInclusiveAmount: number;
  payableAmount: number;
}

export interface EmbeddedAttachment {
  /** Base64 content */
  content: string;
  mimeCode: string;
  filename: string;
}

export interface DocumentReference {
  id: string;
  description: string;
  attachment?: EmbeddedAttachment;
}

/**
 * File access used when the attachment is given as a path
 */
export interface AttachmentReader {
  readFile(path: string): Buffer;
  detectMimeType(content: Buffer): string;
}

/**
 * Per-build options
 */
export interface BuildOptions {
  /** Issue date (default: now) */
  issueDate?: Date;
  /** File access for attachments given as a path (default: local file system) */
  attachmentReader?: AttachmentReader;
}

/**
 * Assembled document before serialization
 */
export interface UblDocument {
  kind: DocumentKind;
  customizationId: string;
  profileId: string;
  id: string;
  issueDate: string;
  dueDate?: string;
  currency: string;
  buyerReference?: string;
  invoicePeriod?: { startDate: string; endDate: string };
  orderReference: string;
  documentReferences: DocumentReference[];
  supplier: PartyFragment;
  customer: PartyFragment;
  delivery?: { actualDeliveryDate?: string; address?: Address };
  paymentMeans: { code: string; accountId: string; branchId?: string };
  paymentTermsNote?: string;
  taxTotal: TaxAggregate;
  monetaryTotals: MonetaryTotals;
  lines: LineFragment[];
}

export interface PartyFragment {
  endpoint: { schemeId: string; value: string };
  name: string;
  registrationName: string;
  companyId: string;
  address: Address;
}

/**
 * Configuration for the validation service client
 *
 * @example
 * ```typescript
 * const config: PeppolValidatorConfig = {
 *   url: 'https://validator.example.com/api/validate',
 *   timeout: 10000,
 * };
 * ```
 */
export interface PeppolValidatorConfig {
  /** Validation endpoint (default: PEPPOL_VALIDATOR_URL environment variable) */
  url?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Extra request headers, e.g. an API key */
  headers?: Record<string, string>;
}

export interface ValidationMessage {
  /** Business rule or schema rule identifier, e.g. BR-CO-15 */
  rule?: string;
  /** fatal, warning, ... */
  flag?: string;
  message: string;
}

/**
 * Validation result for XML documents
 */
export interface ValidationResult {
  /** Whether the document is valid */
  valid: boolean;
  /** Validation details or error messages */
  details: string;
  /** Individual findings */
  messages: ValidationMessage[];
}

/**
 * Summary of a UBL document read back from XML
 */
export interface UblDocumentSummary {
  kind: DocumentKindName;
  id: string;
  issueDate: string;
  dueDate?: string;
  currency: string;
  taxAmount: number;
  subtotals: Array<{ categoryId: string; percent: number; taxableAmount: number; taxAmount: number }>;
  lineExtensionAmount: number;
  taxExclusiveAmount: number;
  taxInclusiveAmount: number;
  payableAmount: number;
  lineCount: number;
  attachmentCount: number;
}
