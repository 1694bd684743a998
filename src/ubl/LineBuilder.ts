import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces';
import { DocumentKind, InvoiceLine, LineFragment, ResolvedTaxCategory } from '../types';
import { UNSPECIFIED_UNIT_CODE } from '../constants';
import { formatAmount, formatDecimal, formatPrice, roundAmount } from '../utils/money';
import { appendTaxCategoryXml, isZeroRated, resolveTaxCategory } from './taxCategory';

export interface LineAmounts {
  lineExtensionAmount: number;
  taxAmount: number;
  taxCategory: ResolvedTaxCategory;
}

/**
 * Calculate the taxable and tax amounts of a line
 *
 * Shared by the line builder and the tax aggregator.
 *
 * @param line Invoice line
 * @returns Rounded amounts and the resolved tax category
 */
export function calculateLineAmounts(line: InvoiceLine): LineAmounts {
  const taxCategory = resolveTaxCategory(line);
  const lineExtensionAmount = roundAmount(line.quantity * line.unitPrice);
  const taxAmount = isZeroRated(taxCategory.id) ? 0 : roundAmount((lineExtensionAmount * taxCategory.percent) / 100);

  return { lineExtensionAmount, taxAmount, taxCategory };
}

/**
 * Convert one input line into its output representation
 * @param index Zero-based position in the input list
 * @param line Invoice line
 */
export function buildLine(index: number, line: InvoiceLine): LineFragment {
  const { lineExtensionAmount, taxAmount, taxCategory } = calculateLineAmounts(line);

  return {
    id: String(index + 1),
    quantity: line.quantity,
    unitCode: UNSPECIFIED_UNIT_CODE,
    lineExtensionAmount,
    taxAmount,
    name: line.name,
    description: line.description || undefined,
    unitPrice: line.unitPrice,
    taxCategory,
  };
}

/**
 * Write a cac:InvoiceLine / cac:CreditNoteLine element
 * @param root Document root
 * @param kind Document kind
 * @param line Line fragment
 * @param currency Document currency
 */
export function appendLineXml(root: XMLBuilder, kind: DocumentKind, line: LineFragment, currency: string): void {
  const lineElement = root
    .ele(kind.lineElement)
    .ele('cbc:ID')
    .txt(line.id)
    .up()
    .ele(kind.quantityElement, { unitCode: line.unitCode })
    .txt(formatDecimal(line.quantity))
    .up()
    .ele('cbc:LineExtensionAmount', { currencyID: currency })
    .txt(formatAmount(line.lineExtensionAmount))
    .up();

  if (kind.hasLineTaxTotal) {
    lineElement.ele('cac:TaxTotal').ele('cbc:TaxAmount', { currencyID: currency }).txt(formatAmount(line.taxAmount)).up().up();
  }

  const itemElement = lineElement.ele('cac:Item');
  if (line.description) {
    itemElement.ele('cbc:Description').txt(line.description).up();
  }
  itemElement.ele('cbc:Name').txt(line.name).up();
  appendTaxCategoryXml(itemElement, 'cac:ClassifiedTaxCategory', line.taxCategory);

  lineElement
    .ele('cac:Price')
    .ele('cbc:PriceAmount', { currencyID: currency })
    .txt(formatPrice(line.unitPrice))
    .up()
    .up();
}
