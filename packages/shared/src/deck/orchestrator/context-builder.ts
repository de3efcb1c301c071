/**
 * Context Builder
 *
 * Assembles the prompts for the two completion calls of a run (planning and
 * drafting). Each section is wrapped in XML tags so the model can refer to it
 * by name.
 *
 * Design principles:
 * - TypeScript assembles all context — the model receives pre-shaped input
 * - Stage-specific context selection (each stage only sees what it needs)
 * - Source excerpts are truncated so one verbose page cannot crowd out the rest
 */

import type { OutlineEntry, ResearchSummary } from './types.ts';

// ============================================================================
// CONSTANTS
// ============================================================================

/** Per-source excerpt cap in the drafting context. */
export const MAX_EXCERPT_CHARS = 600;

export interface StagePrompt {
  systemPrompt: string;
  userMessage: string;
}

// ============================================================================
// SYSTEM PROMPTS
// ============================================================================

const PLANNING_SYSTEM_PROMPT = `You are an expert presentation planner.
Your task is to turn a topic into a slide-by-slide outline that a researcher can work from.

GUIDELINES:
1. Produce exactly the requested number of slides, in presentation order.
2. Every slide has a short, specific title and a one-sentence content goal.
3. Every slide has 1-3 concrete web search queries that would surface facts, figures or expert sources for it.
4. Prefer queries that are likely to return numerical or comparative data for at least one slide.

Respond with JSON only, in this shape:
{"slides": [{"slide_number": 1, "title": "...", "search_queries": ["..."], "content_goal": "..."}]}`;

const DRAFTING_SYSTEM_PROMPT = `You are an expert presentation writer and visual designer.
Your task is to transform a slide outline and research notes into the final text of a slide deck.

GUIDELINES:
1. Content: write 3-5 punchy, concise bullet points per slide (no paragraphs).
2. Speaker notes: add brief, engaging notes for the presenter.
3. Sources: cite the source URLs from the research data that each slide relies on.
4. Visuals (CRITICAL):
   - MANDATORY: at least one slide MUST carry a "visual_request" of type "chart" with well-formed data. A deck without a chart is rejected.
   - Put the chart on the slide with the most numerical or comparative data.
     Format chart data strictly as {"labels": ["A", "B"], "values": [10, 20]} with one number per label.
   - If the research has no obvious statistics, synthesize a meaningful chart from what is available (comparisons, trends, key metrics).
   - For a conceptual slide, use a "visual_request" of type "image" whose prompt is a descriptive image search query. Images carry no data.
   - Do not force a visual onto every slide.
5. Produce exactly one slide per outline entry, in outline order.

Respond with JSON only, in this shape:
{"filename_suggestion": "underscore_separated_name",
 "slides": [{"title": "...", "points": ["..."], "speaker_notes": "...", "sources": ["https://..."],
             "visual_request": {"type": "chart", "prompt": "Chart title", "data": {"labels": ["A"], "values": [1]}}}]}`;

// ============================================================================
// PUBLIC API
// ============================================================================

export function buildPlanningPrompt(topic: string, slideCount: number): StagePrompt {
  return {
    systemPrompt: PLANNING_SYSTEM_PROMPT,
    userMessage: [
      wrapXml('TOPIC', topic),
      wrapXml('SLIDE_COUNT', String(slideCount)),
      `Plan a presentation of exactly ${slideCount} slide${slideCount === 1 ? '' : 's'} on this topic.`,
    ].join('\n\n'),
  };
}

/**
 * Drafting context: topic, the outline, and every research summary with its
 * ranked sources. Sections appear in that order.
 */
export function buildDraftingPrompt(
  topic: string,
  outline: readonly OutlineEntry[],
  research: readonly ResearchSummary[],
): StagePrompt {
  const outlineText = outline
    .map((entry) =>
      `${entry.index + 1}. ${entry.title}\n   Goal: ${entry.contentGoal}`,
    )
    .join('\n');

  return {
    systemPrompt: DRAFTING_SYSTEM_PROMPT,
    userMessage: [
      wrapXml('TOPIC', topic),
      wrapXml('OUTLINE', outlineText),
      wrapXml('RESEARCH', research.map(formatResearchSummary).join('\n')),
      `Write the final content for all ${outline.length} slides, with visual requests.`,
    ].join('\n\n'),
  };
}

// ============================================================================
// FORMATTING
// ============================================================================

function formatResearchSummary(summary: ResearchSummary): string {
  const attrs = `slide="${summary.slideIndex + 1}" title="${escapeXmlAttr(summary.slideTitle)}"`;
  if (summary.sources.length === 0) {
    return `<SLIDE ${attrs}>\nNo verified sources found.\n</SLIDE>`;
  }

  const sources = summary.sources.map((source) => {
    const excerpt = (source.content ?? '').trim().slice(0, MAX_EXCERPT_CHARS);
    return (
      `<SOURCE url="${escapeXmlAttr(source.url)}" tier="${source.tier}" score="${source.score}">\n` +
      (source.title ? `${source.title}\n` : '') +
      (excerpt ? `${excerpt}\n` : '') +
      '</SOURCE>'
    );
  });
  return `<SLIDE ${attrs}>\n${sources.join('\n')}\n</SLIDE>`;
}

/**
 * Wrap content in an XML tag pair.
 *
 * @param tag - XML tag name (e.g., 'OUTLINE', 'RESEARCH')
 */
export function wrapXml(tag: string, content: string): string {
  return `<${tag}>\n${content}\n</${tag}>`;
}

/** Escape XML-reserved characters in attribute values. */
function escapeXmlAttr(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}
