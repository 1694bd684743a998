import { PeppolValidationError } from '../errors';
import { PEPPOL_ID_SEPARATOR, PEPPOL_SCHEME_LENGTH } from '../constants';

/**
 * Electronic address of a party, split out of a compound Peppol identifier
 */
export interface PeppolEndpoint {
  schemeId: string;
  value: string;
}

const isDigit = (char: string): boolean => char >= '0' && char <= '9';
const isUppercaseLetter = (char: string): boolean => char >= 'A' && char <= 'Z';

/**
 * Normalize a VAT identifier into its country-prefixed form
 *
 * Leading digits are routing scheme prefixes that ended up in the tax id
 * (e.g. "9925") and are dropped. Greece uses "EL" as VAT prefix instead of its
 * ISO code "GR", also when the prefix comes from the country code. Input that
 * cannot be fixed gets the country code prepended.
 *
 * @param vatNumber - Raw VAT identifier
 * @param countryCode - ISO 3166-1 alpha-2 code of the party's address
 * @returns Normalized VAT identifier
 *
 * ```typescript
 * normalizeVatNumber('9925BE0123456789', 'BE'); // 'BE0123456789'
 * normalizeVatNumber('GR123456789', 'GR'); // 'EL123456789'
 * normalizeVatNumber('be0123456789', 'BE'); // 'BEbe0123456789'
 * ```
 */
export function normalizeVatNumber(vatNumber: string, countryCode: string): string {
  let start = 0;
  while (start < vatNumber.length && isDigit(vatNumber[start])) {
    start++;
  }
  const stripped = vatNumber.slice(start);

  const prefixed = stripped.length < 2 || !isUppercaseLetter(stripped[0]) ? countryCode + stripped : stripped;

  return prefixed.startsWith('GR') ? 'EL' + prefixed.slice(2) : prefixed;
}

/**
 * Split a compound Peppol identifier ("0208:0123456789") into scheme and value
 *
 * @throws {PeppolValidationError} If the identifier has no four character scheme followed by a separator and a value
 */
export function parsePeppolId(peppolId: string): PeppolEndpoint {
  const schemeId = peppolId.slice(0, PEPPOL_SCHEME_LENGTH);
  const separator = peppolId.charAt(PEPPOL_SCHEME_LENGTH);
  const value = peppolId.slice(PEPPOL_SCHEME_LENGTH + 1);

  if (schemeId.length < PEPPOL_SCHEME_LENGTH || separator !== PEPPOL_ID_SEPARATOR || !value) {
    throw new PeppolValidationError(`Malformed Peppol identifier: "${peppolId}"`);
  }

  return { schemeId, value };
}
