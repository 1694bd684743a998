import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces';
import { InvoiceLine, ResolvedTaxCategory } from '../types';
import { formatPercent } from '../utils/money';
import {
  VAT_SCHEME_ID,
  DEFAULT_TAX_CATEGORY_ID,
  DEFAULT_TAX_CATEGORY_NAME,
  INTRA_COMMUNITY_CATEGORY_ID,
  INTRA_COMMUNITY_EXEMPTION_CODE,
  INTRA_COMMUNITY_EXEMPTION_REASON,
} from '../constants';

/**
 * Category specific treatment applied on top of what the line states
 */
export interface TaxCategoryPolicy {
  /** Rate (and tax) forced to zero whatever the line says */
  zeroRated: boolean;
  /** Exemption defaults, overridable per line */
  exemption?: {
    code: string;
    reason: string;
  };
}

/**
 * Categories with bespoke handling. Codes not listed here (S, Z, E, ...) pass
 * the stated rate through without exemption fields.
 */
export const TAX_CATEGORY_POLICIES: Readonly<Record<string, TaxCategoryPolicy>> = {
  // Intra-community supply must be invoiced at 0% with an exemption reason (BR-IC-05, BR-IC-10)
  [INTRA_COMMUNITY_CATEGORY_ID]: {
    zeroRated: true,
    exemption: {
      code: INTRA_COMMUNITY_EXEMPTION_CODE,
      reason: INTRA_COMMUNITY_EXEMPTION_REASON,
    },
  },
};

export function getTaxCategoryPolicy(categoryId: string): TaxCategoryPolicy | undefined {
  return Object.prototype.hasOwnProperty.call(TAX_CATEGORY_POLICIES, categoryId)
    ? TAX_CATEGORY_POLICIES[categoryId]
    : undefined;
}

/**
 * Resolve the effective tax category of a line
 *
 * Both the line builder and the tax aggregator go through this function so
 * they always agree on the rate.
 *
 * @param line Invoice line
 * @returns Category id, display name, effective rate and exemption fields
 */
export function resolveTaxCategory(
  line: Pick<
    InvoiceLine,
    'taxCategoryId' | 'taxCategoryName' | 'taxPercent' | 'taxExemptionReasonCode' | 'taxExemptionReason'
  >
): ResolvedTaxCategory {
  const id = line.taxCategoryId || DEFAULT_TAX_CATEGORY_ID;
  const name = line.taxCategoryName || DEFAULT_TAX_CATEGORY_NAME;
  const statedPercent = line.taxPercent ?? 0;

  const policy = getTaxCategoryPolicy(id);
  if (!policy) {
    return { id, name, percent: statedPercent };
  }

  const resolved: ResolvedTaxCategory = {
    id,
    name,
    percent: policy.zeroRated ? 0 : statedPercent,
  };

  if (policy.exemption) {
    resolved.exemptionReasonCode = line.taxExemptionReasonCode || policy.exemption.code;
    resolved.exemptionReason = line.taxExemptionReason || policy.exemption.reason;
  }

  return resolved;
}

export function isZeroRated(categoryId: string): boolean {
  return getTaxCategoryPolicy(categoryId)?.zeroRated ?? false;
}

/**
 * Write a tax category (cac:ClassifiedTaxCategory or cac:TaxCategory)
 * @param parent Parent element
 * @param tagName Element name
 * @param category Resolved category
 */
export function appendTaxCategoryXml(parent: XMLBuilder, tagName: string, category: ResolvedTaxCategory): void {
  const categoryElement = parent
    .ele(tagName)
    .ele('cbc:ID')
    .txt(category.id)
    .up()
    .ele('cbc:Name')
    .txt(category.name)
    .up()
    .ele('cbc:Percent')
    .txt(formatPercent(category.percent))
    .up();

  if (category.exemptionReasonCode) {
    categoryElement.ele('cbc:TaxExemptionReasonCode').txt(category.exemptionReasonCode).up();
  }
  if (category.exemptionReason) {
    categoryElement.ele('cbc:TaxExemptionReason').txt(category.exemptionReason).up();
  }

  categoryElement.ele('cac:TaxScheme').ele('cbc:ID').txt(VAT_SCHEME_ID).up().up();
}
