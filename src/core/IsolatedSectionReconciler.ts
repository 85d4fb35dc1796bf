/**
 * IsolatedSectionReconciler.ts
 * Folds tiny leftover sections into a neighbour whose text they resemble.
 * Runs after the resolver and never calls the oracle. Also recovers sections
 * the oracle missed from the headings that open them.
 */
import {
  ALL_SECTION_CATEGORIES,
  CategoryId,
  FALLBACK_CATEGORY,
  isKnownCategory,
  SECTION_TITLES,
  SectionCategory,
} from '../models/categories';
import { PageLabel, Section } from '../models/PageClassification';
import { PageCorpus } from './PageCorpus';
import { aggregateSections } from './SectionAggregator';
import emojiLogger from '../utils/emojiLogger';
import { logger } from '../utils/logger';
import { lineSimilarity, normalizeLine, sectionSimilarity } from '../utils/textSimilarity';

export interface ReconcileOptions {
  maxPages: number;        // sections this small are candidates
  threshold: number;       // similarity a neighbour must exceed
  samplePages: number;     // pages sampled from each neighbour
}

export interface ReconcileMerge {
  section: Section;
  into: SectionCategory;
  score: number;
}

export interface ReconcileResult {
  labels: PageLabel[];
  merges: ReconcileMerge[];
}

function pageSpan(start: number, end: number): number[] {
  const pages: number[] = [];
  for (let i = start; i <= end; i++) {
    pages.push(i);
  }
  return pages;
}

/**
 * First three and last two salient lines of every page
 */
export function representativeLines(corpus: PageCorpus, pages: readonly number[]): string[] {
  return pages.flatMap(page => corpus.excerpt(page, 3, 2));
}

/**
 * Pages of `section` closest to the candidate: its tail when it comes before, its head otherwise
 */
function samplePagesOf(section: Section, samplePages: number, fromEnd: boolean): number[] {
  const count = Math.min(samplePages, section.numPages);
  return fromEnd
    ? pageSpan(section.endPage - count + 1, section.endPage)
    : pageSpan(section.startPage, section.startPage + count - 1);
}

function sectionKey(section: Section): string {
  return `${section.name}:${section.startPage}-${section.endPage}`;
}

interface ScoredNeighbour {
  category: SectionCategory;
  score: number;
}

function scoreNeighbour(
  candidateLines: readonly string[],
  neighbour: Section | undefined,
  corpus: PageCorpus,
  samplePages: number,
  fromEnd: boolean
): ScoredNeighbour | undefined {
  if (neighbour === undefined || !isKnownCategory(neighbour.name)) {
    return undefined;
  }
  const lines = representativeLines(corpus, samplePagesOf(neighbour, samplePages, fromEnd));
  return { category: neighbour.name, score: sectionSimilarity(candidateLines, lines) };
}

/**
 * Repeatedly take the leftmost untried section of at most `maxPages` pages and
 * relabel it to its most similar adjacent section when that score beats the
 * threshold and every non-adjacent section of another category. An adjacent
 * section that is itself that small is only considered when the other side
 * has no larger known section. Confidences are kept.
 * @param labels one label per page, in page order
 */
export function reconcileIsolatedSections(
  labels: readonly PageLabel[],
  corpus: PageCorpus,
  options: ReconcileOptions
): ReconcileResult {
  const current = labels.map(label => ({ ...label }));
  const merges: ReconcileMerge[] = [];
  const tried = new Set<string>();

  for (;;) {
    const sections = aggregateSections(current);
    const index = sections.findIndex(
      section => section.numPages <= options.maxPages && !tried.has(sectionKey(section))
    );
    if (index === -1) {
      break;
    }

    const section = sections[index];
    tried.add(sectionKey(section));

    const candidateLines = representativeLines(corpus, pageSpan(section.startPage, section.endPage));
    if (candidateLines.length === 0) {
      continue;
    }

    const before = sections[index - 1];
    const after = sections[index + 1];
    // a neighbour that is itself a candidate only counts when no larger known neighbour exists
    const isLarge = (neighbour: Section | undefined): boolean =>
      neighbour !== undefined && isKnownCategory(neighbour.name) && neighbour.numPages > options.maxPages;
    const largeOnly = isLarge(before) || isLarge(after);

    const previous = !largeOnly || isLarge(before)
      ? scoreNeighbour(candidateLines, before, corpus, options.samplePages, true)
      : undefined;
    const next = !largeOnly || isLarge(after)
      ? scoreNeighbour(candidateLines, after, corpus, options.samplePages, false)
      : undefined;
    const best = next !== undefined && (previous === undefined || next.score > previous.score) ? next : previous;
    if (best === undefined || best.score <= options.threshold) {
      continue;
    }

    let farthestRival = 0;
    sections.forEach((other, otherIndex) => {
      if (Math.abs(otherIndex - index) <= 1 || other.name === best.category) {
        return;
      }
      const lines = representativeLines(corpus, samplePagesOf(other, options.samplePages, false));
      farthestRival = Math.max(farthestRival, sectionSimilarity(candidateLines, lines));
    });
    if (best.score <= farthestRival) {
      logger.debug(
        `Pages ${section.startPage}-${section.endPage} resemble a non-adjacent section (${farthestRival.toFixed(2)}), left as is`
      );
      continue;
    }

    for (let i = section.startPage; i <= section.endPage; i++) {
      current[i] = { ...current[i], category: best.category };
    }
    merges.push({ section, into: best.category, score: best.score });
    emojiLogger.reconcile(
      `Merged ${section.name} pages ${section.startPage}-${section.endPage} into ${best.category} (similarity ${best.score.toFixed(2)})`
    );
  }

  return { labels: current, merges };
}

export interface TitleMatchOptions {
  minScore: number;       // an UNKNOWN page takes a title scoring at least this
  relabelScore: number;   // a classified page needs this, and must open its section
}

export interface TitleMatch {
  pageIndex: number;
  category: SectionCategory;
  score: number;
  line: string;
}

export interface TitleMatchResult {
  labels: PageLabel[];
  matches: TitleMatch[];
}

// leading salient lines of a page compared with the titles
const TITLE_LINES = 2;

function normalizeTitle(text: string): string {
  return normalizeLine(
    text.normalize('NFKD').replace(/[\u0300-\u036f]/g, '').replace(/[^\p{L}\p{N}\s]/gu, ' ')
  );
}

interface TitleVariant {
  title: string;
  category: SectionCategory;
}

/**
 * Every normalized title plus its two- and three-word openings. An opening
 * shared by several categories ("registre des") names none of them.
 */
function buildTitleVariants(): TitleVariant[] {
  const full: TitleVariant[] = [];
  const openings = new Map<string, Set<SectionCategory>>();

  for (const category of ALL_SECTION_CATEGORIES) {
    for (const title of SECTION_TITLES[category]) {
      const normalized = normalizeTitle(title);
      full.push({ title: normalized, category });

      const words = normalized.split(' ');
      for (const length of [2, 3]) {
        if (words.length > length) {
          const opening = words.slice(0, length).join(' ');
          openings.set(opening, (openings.get(opening) ?? new Set<SectionCategory>()).add(category));
        }
      }
    }
  }

  const distinctive: TitleVariant[] = [];
  openings.forEach((categories, title) => {
    if (categories.size === 1) {
      distinctive.push(...[...categories].map(category => ({ title, category })));
    }
  });
  return [...full, ...distinctive];
}

const TITLE_VARIANTS = buildTitleVariants();

function titleScore(line: string, title: string): number {
  if (line.includes(title)) {
    return 1;
  }
  if (title.includes(line) && line.length >= 5) {
    return 0.95;
  }
  return lineSimilarity(line, title);
}

/**
 * Best title among the first lines; on equal scores the longer title wins
 */
export function bestTitleMatch(lines: readonly string[]): Omit<TitleMatch, 'pageIndex'> | undefined {
  let best: { variant: TitleVariant; score: number; line: string } | undefined;

  for (const line of lines) {
    const normalized = normalizeTitle(line);
    if (!normalized) {
      continue;
    }
    for (const variant of TITLE_VARIANTS) {
      const score = titleScore(normalized, variant.title);
      if (
        best === undefined ||
        score > best.score ||
        (score === best.score && variant.title.length > best.variant.title.length)
      ) {
        best = { variant, score, line: line.trim() };
      }
    }
  }

  return best && { category: best.variant.category, score: best.score, line: best.line };
}

/**
 * Give a category no page carries to the first page whose opening lines read
 * like its title. UNKNOWN pages need `minScore`; classified pages need
 * `relabelScore` and must be the first page of their section. Each category
 * is recovered at most once, with confidence 85 plus 15 times the score.
 */
export function matchSectionTitles(
  labels: readonly PageLabel[],
  corpus: PageCorpus,
  options: TitleMatchOptions
): TitleMatchResult {
  const current = labels.map(label => ({ ...label }));
  const present = new Set(labels.map(label => label.category));
  const missing = new Set(ALL_SECTION_CATEGORIES.filter(category => !present.has(category)));
  const matches: TitleMatch[] = [];

  labels.forEach((label, position) => {
    if (missing.size === 0) {
      return;
    }
    const found = bestTitleMatch(corpus.salientLines(label.pageIndex).slice(0, TITLE_LINES));
    if (found === undefined || !missing.has(found.category)) {
      return;
    }

    const opensSection = position === 0 || labels[position - 1].category !== label.category;
    const accepted = isKnownCategory(label.category)
      ? opensSection && found.score >= options.relabelScore
      : found.score >= options.minScore;
    if (!accepted) {
      return;
    }

    current[position] = {
      ...label,
      category: found.category,
      confidence: Math.round((85 + found.score * 15) * 100) / 100,
    };
    missing.delete(found.category);
    matches.push({ pageIndex: label.pageIndex, ...found });
    emojiLogger.reconcile(
      `Page ${label.pageIndex} opens ${found.category} ("${found.line}", score ${found.score.toFixed(2)})`
    );
  });

  return { labels: current, matches };
}

/**
 * Give every UNKNOWN page the category of the closest known page before it,
 * or after it at the start of the document. Confidence stays 0.
 */
export function absorbUnknownPages(labels: readonly PageLabel[], fallback: SectionCategory = FALLBACK_CATEGORY): PageLabel[] {
  const firstKnown = labels.find(label => isKnownCategory(label.category));

  if (firstKnown === undefined) {
    if (labels.length > 0) {
      emojiLogger.warn(`No page could be classified; assigning all ${labels.length} pages to ${fallback}`);
    }
    return labels.map(label => ({ ...label, category: fallback }));
  }

  let carried: CategoryId = firstKnown.category;
  let absorbed = 0;
  const result = labels.map(label => {
    if (isKnownCategory(label.category)) {
      carried = label.category;
      return { ...label };
    }
    absorbed++;
    return { ...label, category: carried };
  });

  if (absorbed > 0) {
    emojiLogger.reconcile(`Absorbed ${absorbed} unknown pages into neighbouring sections`);
  }
  return result;
}
