/**
 * Assembly Reconciler
 *
 * Merges generated visuals back into the drafted slides by position.
 * A left join on slide index: every slide appears exactly once and in draft
 * order, whatever order the assets arrive in and whether or not a slide's
 * visual survived illustration.
 */

import type {
  DeckContent,
  DeckRequest,
  FinalSlidePayload,
  GeneratedAsset,
  IndexedVisualRequest,
  SlideContent,
} from './types.ts';

export const PRESENTATION_EXTENSION = '.pptx';

/** Used when neither the caller, the draft nor the topic yields a usable name. */
export const FALLBACK_FILENAME = 'presentation';

const MAX_FILENAME_LENGTH = 100;

// ============================================================================
// VISUAL REQUESTS
// ============================================================================

/** Visual requests in slide order, addressed by slide position. */
export function collectVisualRequests(slides: readonly SlideContent[]): IndexedVisualRequest[] {
  const requests: IndexedVisualRequest[] = [];
  slides.forEach((slide, slideIndex) => {
    if (slide.visualRequest) {
      requests.push({ slideIndex, request: slide.visualRequest });
    }
  });
  return requests;
}

// ============================================================================
// RECONCILIATION
// ============================================================================

/**
 * Build the assembly payload: slide i gets the file path of the asset whose
 * slideIndex is i, else `image: null`. Assets pointing outside the deck are
 * ignored; when several target one slide the first wins.
 */
export function reconcileSlides(
  slides: readonly SlideContent[],
  assets: readonly GeneratedAsset[],
): FinalSlidePayload[] {
  const imageBySlide = new Map<number, string>();
  for (const asset of assets) {
    if (!imageBySlide.has(asset.slideIndex)) {
      imageBySlide.set(asset.slideIndex, asset.filePath);
    }
  }

  return slides.map((slide, index) => ({
    title: slide.title,
    points: [...slide.points],
    image: imageBySlide.get(index) ?? null,
    ...(slide.speakerNotes ? { speaker_notes: slide.speakerNotes } : {}),
    sources: [...slide.sources],
  }));
}

// ============================================================================
// FILENAMES
// ============================================================================

/**
 * Reduce a free-form name to `[A-Za-z0-9_-]`, spaces becoming underscores.
 * A trailing `.pptx` is dropped first. May return ''.
 */
export function sanitizeFilename(raw: string): string {
  return raw
    .trim()
    .replace(/\.pptx$/i, '')
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9_-]/g, '')
    .slice(0, MAX_FILENAME_LENGTH);
}

/**
 * Base name (no extension) for the assembly tool. Precedence: the caller's
 * filename, the drafting suggestion, the topic.
 */
export function resolveBaseFilename(request: DeckRequest, content: Pick<DeckContent, 'filenameSuggestion'>): string {
  const candidates = [request.filename, content.filenameSuggestion, request.topic];
  for (const candidate of candidates) {
    if (candidate === undefined) continue;
    const name = sanitizeFilename(candidate);
    if (name) return name;
  }
  return FALLBACK_FILENAME;
}
