import { BuildOptions, CreditNoteInput, DocumentKindName, DocumentInput, InvoiceInput } from './types';
import { PeppolSdkError, PeppolValidationError } from './errors';
import { buildUblDocument } from './ubl/DocumentBuilder';
import { DOCUMENT_KINDS } from './ubl/documentKinds';
import { tryCatch } from './tryCatch';

/**
 * UBL XML Builder for Peppol BIS Billing 3.0
 *
 * Handles generation of UBL 2.1 invoices and credit notes, including VAT
 * aggregation per (category, rate) and intra-community supply handling.
 *
 * @example
 * ```typescript
 * const builder = new UblBuilder();
 *
 * const xml = builder.generateInvoiceXml({
 *   documentNumber: 'INV-2024-001',
 *   supplier: {
 *     name: 'Supplier BV',
 *     vatNumber: 'BE0123456789',
 *     peppolId: '0208:0123456789',
 *     address: { street: 'Main Street 1', city: 'Brussels', postalZone: '1000', countryCode: 'BE' },
 *   },
 *   customer: {
 *     name: 'Customer SA',
 *     vatNumber: 'FR12345678901',
 *     peppolId: '9957:FR12345678901',
 *     address: { countryCode: 'FR' },
 *   },
 *   deliveryAddress: { countryCode: 'FR' },
 *   actualDeliveryDate: '2024-03-01',
 *   iban: 'BE71096123456769',
 *   lines: [
 *     {
 *       name: 'Product/Service',
 *       quantity: 1,
 *       unitPrice: 100,
 *       taxCategoryId: 'K',
 *       taxCategoryName: 'Intra-community supply',
 *     },
 *   ],
 * });
 * ```
 */
export class UblBuilder {
  private defaults: BuildOptions;

  /**
   * @param defaults Options applied to every build unless overridden per call
   */
  constructor(defaults: BuildOptions = {}) {
    this.defaults = defaults;
  }

  /**
   * Generate UBL invoice XML
   *
   * @param invoiceData Invoice data
   * @param options Per-call build options
   * @returns UBL XML string ready for delivery
   * @throws {PeppolValidationError} If invoice data is invalid
   * @throws {PeppolAttachmentError} If the attachment file cannot be read
   */
  public generateInvoiceXml(invoiceData: InvoiceInput, options: BuildOptions = {}): string {
    return this.generate('invoice', invoiceData, options);
  }

  /**
   * Generate UBL credit note XML
   *
   * @param creditNoteData Credit note data
   * @param options Per-call build options
   * @returns UBL XML string ready for delivery
   * @throws {PeppolValidationError} If credit note data is invalid
   * @throws {PeppolAttachmentError} If the attachment file cannot be read
   */
  public generateCreditNoteXml(creditNoteData: CreditNoteInput, options: BuildOptions = {}): string {
    return this.generate('creditNote', creditNoteData, options);
  }

  /**
   * Generate a document of the given kind
   */
  public generate(kind: DocumentKindName, input: DocumentInput, options: BuildOptions = {}): string {
    const { data, error } = tryCatch(() => {
      return buildUblDocument(DOCUMENT_KINDS[kind], input, { ...this.defaults, ...options });
    });

    if (error) {
      if (error instanceof PeppolSdkError) {
        throw error;
      }
      throw new PeppolValidationError(`Failed to generate ${kind} XML: ${error.message}`, { cause: error });
    }

    return data;
  }
}
