/**
 * Reference Data
 *
 * Vendor aliases and category tables, read once from src/data and frozen.
 * Extractors receive this object through their constructors.
 */

import vendorAliases from '@/data/vendor-aliases.json';
import vendorCategories from '@/data/vendor-categories.json';
import keywordCategories from '@/data/keyword-categories.json';
import businessTypeDefaults from '@/data/business-type-defaults.json';
import businessTypeHints from '@/data/business-type-hints.json';
import categoryEngineKeywords from '@/data/category-engine-keywords.json';

export interface VendorAlias {
  readonly canonical: string;
  readonly aliases: readonly string[];
}

export interface KeywordCategory {
  readonly keyword: string;
  readonly category: string;
}

export interface CategoryKeywords {
  readonly category: string;
  readonly keywords: readonly string[];
}

export interface ReferenceData {
  readonly vendorAliases: readonly VendorAlias[];
  readonly vendorCategories: ReadonlyMap<string, string>;
  readonly keywordCategories: readonly KeywordCategory[];
  readonly businessTypeDefaults: ReadonlyMap<string, string>;
  readonly businessTypeHints: ReadonlyMap<string, readonly CategoryKeywords[]>;
  readonly engineKeywords: readonly CategoryKeywords[];
}

function freezeList<T extends object>(items: T[]): readonly T[] {
  return Object.freeze(items.map((item) => Object.freeze({ ...item })));
}

export function buildReferenceData(source: {
  vendorAliases: VendorAlias[];
  vendorCategories: Record<string, string>;
  keywordCategories: KeywordCategory[];
  businessTypeDefaults: Record<string, string>;
  businessTypeHints: Record<string, CategoryKeywords[]>;
  engineKeywords: CategoryKeywords[];
}): ReferenceData {
  return Object.freeze({
    vendorAliases: freezeList(source.vendorAliases),
    vendorCategories: new Map(Object.entries(source.vendorCategories)),
    keywordCategories: freezeList(source.keywordCategories),
    businessTypeDefaults: new Map(
      Object.entries(source.businessTypeDefaults).map(([key, value]) => [key.toLowerCase(), value])
    ),
    businessTypeHints: new Map(
      Object.entries(source.businessTypeHints).map(([key, value]) => [key.toLowerCase(), freezeList(value)])
    ),
    engineKeywords: freezeList(source.engineKeywords),
  });
}

let defaultReferenceData: ReferenceData | null = null;

export function getDefaultReferenceData(): ReferenceData {
  if (!defaultReferenceData) {
    defaultReferenceData = buildReferenceData({
      vendorAliases,
      vendorCategories,
      keywordCategories,
      businessTypeDefaults,
      businessTypeHints,
      engineKeywords: categoryEngineKeywords,
    });
  }
  return defaultReferenceData;
}
