import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces';
import { InvoiceLine, MonetaryTotals, TaxAggregate, TaxSubtotal } from '../types';
import { formatAmount, fromBasisPoints, roundAmount, toBasisPoints } from '../utils/money';
import { calculateLineAmounts } from './LineBuilder';
import { appendTaxCategoryXml } from './taxCategory';

/**
 * Group lines by (category, rate) and total them
 *
 * Rates are keyed in basis points. Each subtotal keeps the category name and
 * exemption fields of the first line seen for its key. Subtotals come back
 * sorted by category id, then rate.
 *
 * @param lines Invoice lines
 * @returns Line extension total, tax total and subtotals
 */
export function aggregateTaxes(lines: InvoiceLine[]): TaxAggregate {
  const groups = new Map<string, TaxSubtotal>();

  lines.forEach((line) => {
    const { lineExtensionAmount, taxAmount, taxCategory } = calculateLineAmounts(line);
    const rateBasisPoints = toBasisPoints(taxCategory.percent);
    const key = `${taxCategory.id}|${rateBasisPoints}`;

    const group = groups.get(key);
    if (group) {
      group.taxableAmount = roundAmount(group.taxableAmount + lineExtensionAmount);
      group.taxAmount = roundAmount(group.taxAmount + taxAmount);
    } else {
      groups.set(key, {
        categoryId: taxCategory.id,
        categoryName: taxCategory.name,
        percent: fromBasisPoints(rateBasisPoints),
        rateBasisPoints,
        taxableAmount: lineExtensionAmount,
        taxAmount,
        exemptionReasonCode: taxCategory.exemptionReasonCode,
        exemptionReason: taxCategory.exemptionReason,
      });
    }
  });

  const subtotals = Array.from(groups.values()).sort(compareSubtotals);

  return {
    lineExtensionAmount: subtotals.reduce((sum, subtotal) => roundAmount(sum + subtotal.taxableAmount), 0),
    taxAmount: subtotals.reduce((sum, subtotal) => roundAmount(sum + subtotal.taxAmount), 0),
    subtotals,
  };
}

function compareSubtotals(a: TaxSubtotal, b: TaxSubtotal): number {
  if (a.categoryId !== b.categoryId) {
    return a.categoryId < b.categoryId ? -1 : 1;
  }
  return a.rateBasisPoints - b.rateBasisPoints;
}

/**
 * Document totals. No allowances, charges or prepayments are modelled, so the
 * tax exclusive amount equals the line total and the payable amount equals the
 * tax inclusive amount.
 */
export function calculateMonetaryTotals(aggregate: TaxAggregate): MonetaryTotals {
  const taxInclusiveAmount = roundAmount(aggregate.lineExtensionAmount + aggregate.taxAmount);

  return {
    lineExtensionAmount: aggregate.lineExtensionAmount,
    taxExclusiveAmount: aggregate.lineExtensionAmount,
    taxInclusiveAmount,
    payableAmount: taxInclusiveAmount,
  };
}

/**
 * Write cac:TaxTotal with one cac:TaxSubtotal per group
 */
export function appendTaxTotalXml(root: XMLBuilder, aggregate: TaxAggregate, currency: string): void {
  const taxTotalElement = root
    .ele('cac:TaxTotal')
    .ele('cbc:TaxAmount', { currencyID: currency })
    .txt(formatAmount(aggregate.taxAmount))
    .up();

  aggregate.subtotals.forEach((subtotal) => {
    const subtotalElement = taxTotalElement
      .ele('cac:TaxSubtotal')
      .ele('cbc:TaxableAmount', { currencyID: currency })
      .txt(formatAmount(subtotal.taxableAmount))
      .up()
      .ele('cbc:TaxAmount', { currencyID: currency })
      .txt(formatAmount(subtotal.taxAmount))
      .up();

    appendTaxCategoryXml(subtotalElement, 'cac:TaxCategory', {
      id: subtotal.categoryId,
      name: subtotal.categoryName,
      percent: subtotal.percent,
      exemptionReasonCode: subtotal.exemptionReasonCode,
      exemptionReason: subtotal.exemptionReason,
    });
  });
}

/**
 * Write cac:LegalMonetaryTotal
 */
export function appendMonetaryTotalXml(root: XMLBuilder, totals: MonetaryTotals, currency: string): void {
  root
    .ele('cac:LegalMonetaryTotal')
    .ele('cbc:LineExtensionAmount', { currencyID: currency })
    .txt(formatAmount(totals.lineExtensionAmount))
    .up()
    .ele('cbc:TaxExclusiveAmount', { currencyID: currency })
    .txt(formatAmount(totals.taxExclusiveAmount))
    .up()
    .ele('cbc:TaxInclusiveAmount', { currencyID: currency })
    .txt(formatAmount(totals.taxInclusiveAmount))
    .up()
    .ele('cbc:PayableAmount', { currencyID: currency })
    .txt(formatAmount(totals.payableAmount))
    .up()
    .up();
}
