import { PeppolValidatorConfig, ValidationResult } from './types';
import { PeppolSdkError, PeppolValidationError } from './errors';
import { DEFAULT_TIMEOUT, MALFORMED_XML_MESSAGE, VALIDATOR_URL_ENV } from './constants';
import { isWellFormedXml, parseValidationResponse } from './utils/xmlParser';
import { HttpClient } from './utils/httpClient';
import { tryCatch } from './tryCatch';

/**
 * Client for an external Peppol BIS 3 validation service
 *
 * The generated XML is posted as-is; the service answers with a JSON report
 * or a Schematron SVRL report, both are accepted.
 *
 * @example
 * ```typescript
 * import { PeppolValidatorClient, UblBuilder } from 'peppol-ubl-builder';
 *
 * const validator = new PeppolValidatorClient({ url: 'https://validator.example.com/api/validate' });
 * const xml = new UblBuilder().generateInvoiceXml(invoice);
 *
 * const result = await validator.validateXml(xml);
 * if (!result.valid) {
 *   console.error(result.details);
 * }
 * ```
 */
export class PeppolValidatorClient {
  private readonly config: Required<PeppolValidatorConfig>;
  private readonly httpClient: HttpClient;

  /**
   * @param config Validator configuration, the url falls back to the PEPPOL_VALIDATOR_URL environment variable
   * @throws {PeppolValidationError} If no url is configured
   */
  constructor(config: PeppolValidatorConfig = {}) {
    const url = config.url ?? process.env[VALIDATOR_URL_ENV] ?? '';
    this.validateConfig(url);

    this.config = {
      url,
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
      headers: config.headers ?? {},
    };

    this.httpClient = new HttpClient({ timeout: this.config.timeout });
  }

  /**
   * Validate a UBL document against the Peppol BIS Billing 3.0 rules
   *
   * A document that is not well-formed XML is reported invalid without
   * contacting the service.
   *
   * @param xmlContent UBL document
   * @returns Validation result with the individual findings
   * @throws {PeppolValidationError} If the content is empty or the service rejects the request
   * @throws {PeppolApiError} If the service cannot be reached or fails
   */
  public async validateXml(xmlContent: string): Promise<ValidationResult> {
    this.validateXmlContent(xmlContent);

    if (!isWellFormedXml(xmlContent)) {
      return {
        valid: false,
        details: MALFORMED_XML_MESSAGE,
        messages: [{ message: MALFORMED_XML_MESSAGE }],
      };
    }

    const { data, error } = await tryCatch(async () => {
      const response = await this.httpClient.post(this.config.url, xmlContent, {
        headers: {
          ...this.config.headers,
          'Content-Type': 'application/xml',
          Accept: 'application/json, application/xml',
        },
      });

      return parseValidationResponse(response.data);
    });

    if (error) {
      this.handleApiError(error, 'Failed to validate XML');
    }

    if (!data.valid) {
      console.warn(`[Peppol] Validation failed with ${data.messages.length} finding(s)`);
    }

    return data;
  }

  private validateConfig(url: string): void {
    if (!url.trim()) {
      throw new PeppolValidationError(`Validator URL is required (config.url or ${VALIDATOR_URL_ENV})`);
    }
  }

  private validateXmlContent(xmlContent: string): void {
    if (!xmlContent?.trim()) {
      throw new PeppolValidationError('XML content is required');
    }
  }

  private handleApiError(error: Error, context: string): never {
    if (error instanceof PeppolSdkError) {
      throw error;
    }

    throw new PeppolSdkError(`${context}: ${error.message || 'Unknown error'}`, { cause: error });
  }
}
