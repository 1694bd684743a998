import { create } from 'xmlbuilder2';
import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces';
import {
  Address,
  BuildOptions,
  CreditNoteInput,
  DocumentInput,
  DocumentKind,
  InvoiceInput,
  InvoiceLine,
  Party,
  PartyFragment,
  UblDocument,
} from '../types';
import {
  DEFAULT_PAYMENT_MEANS_CODE,
  DOCUMENT_CURRENCY,
  PAYMENT_DUE_DAYS,
  PEPPOL_CUSTOMIZATION_ID,
  PEPPOL_PROFILE_ID,
  UBL_NAMESPACES,
  VAT_SCHEME_ID,
} from '../constants';
import { PeppolSerializationError, PeppolValidationError } from '../errors';
import { tryCatch } from '../tryCatch';
import { addDays, formatDate } from '../utils/dateUtils';
import { normalizeVatNumber, parsePeppolId } from '../utils/validators';
import { appendDocumentReferencesXml, resolveAttachment } from './AttachmentEmbedder';
import { CREDIT_NOTE_KIND, INVOICE_KIND } from './documentKinds';
import { appendLineXml, buildLine } from './LineBuilder';
import { aggregateTaxes, appendMonetaryTotalXml, appendTaxTotalXml, calculateMonetaryTotals } from './TaxAggregator';
import { isZeroRated, resolveTaxCategory } from './taxCategory';

/**
 * Peppol BIS Billing 3.0 document assembler
 *
 * One pipeline for invoices and credit notes; everything that differs between
 * the two lives in the DocumentKind descriptor. The input is never modified and
 * every call builds a fresh document.
 */

/**
 * Validate document input data
 * @param input Document input data
 * @throws {PeppolValidationError} If validation fails
 */
function validateDocumentInput(input: DocumentInput): void {
  if (!input) {
    throw new PeppolValidationError('Document input data is required');
  }

  if (!input.documentNumber?.trim()) {
    throw new PeppolValidationError('Document number is required');
  }

  if (!input.supplier) {
    throw new PeppolValidationError('Supplier information is required');
  }
  validateParty(input.supplier, 'Supplier');

  if (!input.customer) {
    throw new PeppolValidationError('Customer information is required');
  }
  validateParty(input.customer, 'Customer');

  if (input.deliveryAddress && !input.deliveryAddress.countryCode?.trim()) {
    throw new PeppolValidationError('Delivery country code is required');
  }

  if (!input.lines || input.lines.length === 0) {
    throw new PeppolValidationError('At least one document line is required');
  }
  input.lines.forEach((line, index) => validateLine(line, index));
}

/**
 * Validate party information
 * @param party Party to validate
 * @param role Party role (for error messages)
 */
function validateParty(party: Party, role: string): void {
  if (!party.name?.trim()) {
    throw new PeppolValidationError(`${role} name is required`);
  }

  if (!party.address?.countryCode?.trim()) {
    throw new PeppolValidationError(`${role} country code is required`);
  }

  // Throws on identifiers too short to split
  parsePeppolId(party.peppolId || '');
}

/**
 * Validate document line
 * @param line Line to validate
 * @param index Line index for error messages
 */
function validateLine(line: InvoiceLine, index: number): void {
  if (!line.name?.trim()) {
    throw new PeppolValidationError(`Line ${index + 1}: Name is required`);
  }

  if (typeof line.quantity !== 'number' || !Number.isFinite(line.quantity) || line.quantity < 0) {
    throw new PeppolValidationError(`Line ${index + 1}: Quantity must be a non-negative number`);
  }

  if (typeof line.unitPrice !== 'number' || !Number.isFinite(line.unitPrice) || line.unitPrice < 0) {
    throw new PeppolValidationError(`Line ${index + 1}: Unit price must be a non-negative number`);
  }

  // Categories with a zero-rate policy ignore the stated rate
  if (line.taxPercent !== undefined && !isZeroRated(resolveTaxCategory(line).id)) {
    if (typeof line.taxPercent !== 'number' || !(line.taxPercent >= 0 && line.taxPercent <= 100)) {
      throw new PeppolValidationError(`Line ${index + 1}: Tax percent must be between 0 and 100`);
    }
  }
}

function buildParty(party: Party): PartyFragment {
  return {
    endpoint: parsePeppolId(party.peppolId),
    name: party.name,
    registrationName: party.registrationName || party.name,
    companyId: normalizeVatNumber(party.vatNumber, party.address.countryCode),
    address: { ...party.address },
  };
}

/**
 * Assemble a document without serializing it
 *
 * @param kind Document kind descriptor
 * @param input Business-level document data
 * @param options Issue date and attachment reader
 * @returns Fresh document value
 * @throws {PeppolValidationError} If input data is invalid
 * @throws {PeppolAttachmentError} If the attachment file cannot be read
 */
export function assembleDocument(kind: DocumentKind, input: DocumentInput, options: BuildOptions = {}): UblDocument {
  validateDocumentInput(input);

  const issueDate = options.issueDate ?? new Date();
  const lines = input.lines.map((line, index) => buildLine(index, line));
  const taxTotal = aggregateTaxes(input.lines);

  const document: UblDocument = {
    kind,
    customizationId: input.customizationId || PEPPOL_CUSTOMIZATION_ID,
    profileId: input.profileId || PEPPOL_PROFILE_ID,
    id: input.documentNumber,
    issueDate: formatDate(issueDate),
    dueDate: kind.hasDueDate ? formatDate(addDays(issueDate, PAYMENT_DUE_DAYS)) : undefined,
    currency: DOCUMENT_CURRENCY,
    buyerReference: input.buyerReference || undefined,
    orderReference: input.documentNumber,
    documentReferences: resolveAttachment(kind, input, options.attachmentReader),
    supplier: buildParty(input.supplier),
    customer: buildParty(input.customer),
    paymentMeans: {
      code: input.paymentMeansCode || DEFAULT_PAYMENT_MEANS_CODE,
      accountId: input.iban,
      branchId: input.bic || undefined,
    },
    paymentTermsNote: input.note || undefined,
    taxTotal,
    monetaryTotals: calculateMonetaryTotals(taxTotal),
    lines,
  };

  if (input.invoicePeriodStart && input.invoicePeriodEnd) {
    document.invoicePeriod = {
      startDate: formatDate(input.invoicePeriodStart),
      endDate: formatDate(input.invoicePeriodEnd),
    };
  }

  // A delivery date without an address still yields a delivery block, just without location
  if (input.deliveryAddress || input.actualDeliveryDate) {
    document.delivery = {
      actualDeliveryDate: input.actualDeliveryDate ? formatDate(input.actualDeliveryDate) : undefined,
      address: input.deliveryAddress ? { ...input.deliveryAddress } : undefined,
    };
  }

  return document;
}

/**
 * Write an address; empty fields are left out
 * @param parent Parent element
 * @param tagName cac:PostalAddress or cac:Address
 * @param address Address
 */
function appendAddressXml(parent: XMLBuilder, tagName: string, address: Address): void {
  const addressElement = parent.ele(tagName);

  if (address.street) {
    addressElement.ele('cbc:StreetName').txt(address.street).up();
  }
  if (address.city) {
    addressElement.ele('cbc:CityName').txt(address.city).up();
  }
  if (address.postalZone) {
    addressElement.ele('cbc:PostalZone').txt(address.postalZone).up();
  }

  addressElement.ele('cac:Country').ele('cbc:IdentificationCode').txt(address.countryCode).up().up();
}

/**
 * Build party XML structure for supplier or customer
 * @param root XML root element
 * @param tagName Tag name (cac:AccountingSupplierParty or cac:AccountingCustomerParty)
 * @param party Party fragment
 */
function appendPartyXml(root: XMLBuilder, tagName: string, party: PartyFragment): void {
  const partyElement = root.ele(tagName).ele('cac:Party');

  partyElement
    .ele('cbc:EndpointID', { schemeID: party.endpoint.schemeId })
    .txt(party.endpoint.value)
    .up()
    .ele('cac:PartyName')
    .ele('cbc:Name')
    .txt(party.name)
    .up()
    .up();

  appendAddressXml(partyElement, 'cac:PostalAddress', party.address);

  partyElement
    .ele('cac:PartyTaxScheme')
    .ele('cbc:CompanyID')
    .txt(party.companyId)
    .up()
    .ele('cac:TaxScheme')
    .ele('cbc:ID')
    .txt(VAT_SCHEME_ID)
    .up()
    .up()
    .up();

  partyElement.ele('cac:PartyLegalEntity').ele('cbc:RegistrationName').txt(party.registrationName).up().up();
}

/**
 * Serialize an assembled document, following the UBL 2.1 element order
 *
 * @param document Assembled document
 * @returns Pretty printed XML with declaration
 */
export function serializeDocument(document: UblDocument): string {
  const { kind, currency } = document;

  const root = create({ version: '1.0', encoding: 'UTF-8' }).ele(kind.rootElement, {
    xmlns: kind.namespace,
    'xmlns:cac': UBL_NAMESPACES.CAC,
    'xmlns:cbc': UBL_NAMESPACES.CBC,
  });

  // Header
  root
    .ele('cbc:CustomizationID')
    .txt(document.customizationId)
    .up()
    .ele('cbc:ProfileID')
    .txt(document.profileId)
    .up()
    .ele('cbc:ID')
    .txt(document.id)
    .up()
    .ele('cbc:IssueDate')
    .txt(document.issueDate)
    .up();

  if (document.dueDate) {
    root.ele('cbc:DueDate').txt(document.dueDate).up();
  }

  root.ele(kind.typeCodeElement).txt(kind.typeCode).up().ele('cbc:DocumentCurrencyCode').txt(currency).up();

  if (document.buyerReference) {
    root.ele('cbc:BuyerReference').txt(document.buyerReference).up();
  }

  if (document.invoicePeriod) {
    root
      .ele('cac:InvoicePeriod')
      .ele('cbc:StartDate')
      .txt(document.invoicePeriod.startDate)
      .up()
      .ele('cbc:EndDate')
      .txt(document.invoicePeriod.endDate)
      .up()
      .up();
  }

  root.ele('cac:OrderReference').ele('cbc:ID').txt(document.orderReference).up().up();

  appendDocumentReferencesXml(root, document.documentReferences);

  // Parties
  appendPartyXml(root, 'cac:AccountingSupplierParty', document.supplier);
  appendPartyXml(root, 'cac:AccountingCustomerParty', document.customer);

  if (document.delivery) {
    const deliveryElement = root.ele('cac:Delivery');
    if (document.delivery.actualDeliveryDate) {
      deliveryElement.ele('cbc:ActualDeliveryDate').txt(document.delivery.actualDeliveryDate).up();
    }
    if (document.delivery.address) {
      appendAddressXml(deliveryElement.ele('cac:DeliveryLocation'), 'cac:Address', document.delivery.address);
    }
  }

  // Payment means
  const accountElement = root
    .ele('cac:PaymentMeans')
    .ele('cbc:PaymentMeansCode')
    .txt(document.paymentMeans.code)
    .up()
    .ele('cac:PayeeFinancialAccount')
    .ele('cbc:ID')
    .txt(document.paymentMeans.accountId)
    .up();

  if (document.paymentMeans.branchId) {
    accountElement.ele('cac:FinancialInstitutionBranch').ele('cbc:ID').txt(document.paymentMeans.branchId).up().up();
  }

  if (document.paymentTermsNote) {
    root.ele('cac:PaymentTerms').ele('cbc:Note').txt(document.paymentTermsNote).up().up();
  }

  appendTaxTotalXml(root, document.taxTotal, currency);
  appendMonetaryTotalXml(root, document.monetaryTotals, currency);

  document.lines.forEach((line) => appendLineXml(root, kind, line, currency));

  return root.end({ prettyPrint: true });
}

/**
 * Build a UBL document of the given kind
 *
 * @param kind Document kind descriptor
 * @param input Business-level document data
 * @param options Issue date and attachment reader
 * @returns UBL XML string
 * @throws {PeppolValidationError} If input data is invalid
 * @throws {PeppolAttachmentError} If the attachment file cannot be read
 * @throws {PeppolSerializationError} If the document cannot be serialized
 */
export function buildUblDocument(kind: DocumentKind, input: DocumentInput, options: BuildOptions = {}): string {
  const document = assembleDocument(kind, input, options);

  const { data, error } = tryCatch(() => serializeDocument(document));

  if (error) {
    throw new PeppolSerializationError(`xml marshal failed: ${error.message}`, { cause: error });
  }

  return data;
}

/**
 * Build a Peppol BIS Billing 3.0 invoice
 *
 * @example
 * ```typescript
 * const xml = buildInvoiceXml({
 *   documentNumber: 'INV-2024-001',
 *   supplier: {
 *     name: 'Supplier BV',
 *     vatNumber: 'BE0123456789',
 *     peppolId: '0208:0123456789',
 *     address: { street: 'Main Street 1', city: 'Brussels', postalZone: '1000', countryCode: 'BE' },
 *   },
 *   customer: {
 *     name: 'Customer GmbH',
 *     vatNumber: 'DE123456789',
 *     peppolId: '9930:DE123456789',
 *     address: { street: 'Hauptstrasse 2', city: 'Berlin', postalZone: '10115', countryCode: 'DE' },
 *   },
 *   iban: 'BE71096123456769',
 *   lines: [{ name: 'Consulting', quantity: 10, unitPrice: 100, taxPercent: 21 }],
 * });
 * ```
 */
export function buildInvoiceXml(input: InvoiceInput, options: BuildOptions = {}): string {
  return buildUblDocument(INVOICE_KIND, input, options);
}

/**
 * Build a Peppol BIS Billing 3.0 credit note
 */
export function buildCreditNoteXml(input: CreditNoteInput, options: BuildOptions = {}): string {
  return buildUblDocument(CREDIT_NOTE_KIND, input, options);
}
