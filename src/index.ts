/**
 * Peppol UBL Builder
 *
 * Generates UBL 2.1 invoices and credit notes compliant with Peppol BIS Billing 3.0,
 * with VAT aggregation per category and rate, embedded PDF attachments and an
 * optional client for an external validation service.
 *
 * @example
 * ```typescript
 * import { UblBuilder, PeppolValidatorClient, parseUblDocument } from 'peppol-ubl-builder';
 *
 * const builder = new UblBuilder();
 * const xml = builder.generateInvoiceXml(invoice);
 *
 * // Reconcile totals
 * const summary = parseUblDocument(xml);
 * console.log(summary.payableAmount);
 *
 * // Validate against the Peppol rules
 * const validator = new PeppolValidatorClient({ url: 'https://validator.example.com/api/validate' });
 * const result = await validator.validateXml(xml);
 * ```
 */

// Main exports
export { UblBuilder } from './UblBuilder';
export { PeppolValidatorClient } from './PeppolValidatorClient';
export { parseUblDocument, parseValidationResponse } from './utils/xmlParser';

// Types
export * from './types';

// Errors
export * from './errors';

// UBL Builder
export * from './ubl';

// Utilities (for advanced users)
export * as Utils from './utils/xmlParser';
export * as DateUtils from './utils/dateUtils';
export * as MoneyUtils from './utils/money';
export * as MimeUtils from './utils/mimeSniffer';
export * as ValidatorsUtils from './utils/validators';

// Constants (for advanced users)
export * as Constants from './constants';

// Default export for convenience
export { UblBuilder as default } from './UblBuilder';
