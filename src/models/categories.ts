// Minute book section labels and helpers to map oracle output onto them

/**
 * The ten canonical minute book sections, in the order they usually appear
 */
export enum SectionCategory {
  ARTICLES_AMENDMENTS = 'Articles & Amendments',
  BY_LAWS = 'By Laws',
  UNANIMOUS_SHAREHOLDER_AGREEMENT = 'Unanimous Shareholder Agreement',
  MINUTES_RESOLUTIONS = 'Minutes & Resolutions',
  DIRECTORS_REGISTER = 'Directors Register',
  OFFICERS_REGISTER = 'Officers Register',
  SHAREHOLDER_REGISTER = 'Shareholder Register',
  SECURITIES_REGISTER = 'Securities Register',
  SHARE_CERTIFICATES = 'Share Certificates',
  ULTIMATE_BENEFICIAL_OWNER_REGISTER = 'Ultimate Beneficial Owner Register',
}

/**
 * Placeholder for a page the oracle has not (successfully) classified
 */
export const UNKNOWN_CATEGORY = 'UNKNOWN';
export type UnknownCategory = typeof UNKNOWN_CATEGORY;

export type CategoryId = SectionCategory | UnknownCategory;

export const ALL_SECTION_CATEGORIES: readonly SectionCategory[] = Object.values(SectionCategory);

/**
 * Headings a section usually opens with, in English and French
 */
export const SECTION_TITLES: Readonly<Record<SectionCategory, readonly string[]>> = {
  [SectionCategory.ARTICLES_AMENDMENTS]: ['Articles & Amendments', 'Statuts et Amendements'],
  [SectionCategory.BY_LAWS]: ['By Laws', 'Règlements'],
  [SectionCategory.UNANIMOUS_SHAREHOLDER_AGREEMENT]: [
    'Unanimous Shareholder Agreement',
    "Convention Unanime d'Actionnaires",
  ],
  [SectionCategory.MINUTES_RESOLUTIONS]: ['Minutes & Resolutions', 'Procès-verbaux et Résolutions'],
  [SectionCategory.DIRECTORS_REGISTER]: ['Directors Register', 'Registre des Administrateurs'],
  [SectionCategory.OFFICERS_REGISTER]: ['Officers Register', 'Registre des Dirigeants'],
  [SectionCategory.SHAREHOLDER_REGISTER]: ['Shareholder Register', 'Registre des Actionnaires'],
  [SectionCategory.SECURITIES_REGISTER]: ['Securities Register', 'Registre des Valeurs Mobilières'],
  [SectionCategory.SHARE_CERTIFICATES]: ['Share Certificates', "Certificats d'Actions"],
  [SectionCategory.ULTIMATE_BENEFICIAL_OWNER_REGISTER]: [
    'Ultimate Beneficial Owner Register',
    'Registre des Particuliers Ayant un Contrôle Important',
  ],
};

/**
 * Minutes & Resolutions is the catch-all section of a minute book
 */
export const FALLBACK_CATEGORY = SectionCategory.MINUTES_RESOLUTIONS;

export function isSectionCategory(value: unknown): value is SectionCategory {
  return typeof value === 'string' && ALL_SECTION_CATEGORIES.some(category => category === value);
}

export function isKnownCategory(category: CategoryId): category is SectionCategory {
  return category !== UNKNOWN_CATEGORY;
}

/**
 * 1-based number of a category, as used by compact CSV replies
 */
export function categoryNumber(category: SectionCategory): number {
  return ALL_SECTION_CATEGORIES.indexOf(category) + 1;
}

export function categoryFromNumber(num: number): SectionCategory | undefined {
  if (!Number.isInteger(num) || num < 1 || num > ALL_SECTION_CATEGORIES.length) {
    return undefined;
  }
  return ALL_SECTION_CATEGORIES[num - 1];
}

function normalizeLabelText(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '');
}

const NORMALIZED_CATEGORIES = ALL_SECTION_CATEGORIES.map(category => ({
  category,
  normalized: normalizeLabelText(category),
}));

/**
 * Map a raw label from the oracle onto a canonical category.
 * Accepts the exact name, its 1-based number, or a loosely written name
 * such as "by-laws" or "DIRECTORS REGISTER".
 */
export function canonicalizeCategory(raw: string | number | null | undefined): SectionCategory | undefined {
  if (raw === null || raw === undefined) {
    return undefined;
  }

  if (typeof raw === 'number') {
    return categoryFromNumber(raw);
  }

  const trimmed = raw.trim().replace(/^["'`]+|["'`]+$/g, '');
  if (!trimmed) {
    return undefined;
  }

  if (isSectionCategory(trimmed)) {
    return trimmed;
  }

  if (/^\d+$/.test(trimmed)) {
    return categoryFromNumber(parseInt(trimmed, 10));
  }

  const normalized = normalizeLabelText(trimmed);
  if (!normalized) {
    return undefined;
  }

  const exact = NORMALIZED_CATEGORIES.find(entry => entry.normalized === normalized);
  if (exact) {
    return exact.category;
  }

  // "Directors Register (Registre des administrateurs)" and similar decorated labels
  const contained = NORMALIZED_CATEGORIES.find(entry => normalized.includes(entry.normalized));
  return contained?.category;
}
