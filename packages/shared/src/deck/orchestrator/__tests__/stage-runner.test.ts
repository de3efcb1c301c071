import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { RawSourceRecord } from '@deckwright/source-ranking-core';
import { DEFAULT_BLOCKED_DOMAINS, StageRunner, parseVisualRequest, type StageRunnerConfig } from '../stage-runner.ts';
import { DeckLlmClient } from '../llm-client.ts';
import {
  CompletionTransportError,
  DraftingConstraintViolationError,
  DraftingFailedError,
  InvalidRequestError,
  PlanningFailedError,
  ToolError,
} from '../errors.ts';
import type { DeckTools, OutlineEntry, ResearchSummary, SubstepEvent } from '../types.ts';
import { CHART_VISUAL, draftJson, fakePages, outlineJson, scriptedTransport } from './fakes.ts';

// ============================================================================
// HELPERS
// ============================================================================

const CONFIG: StageRunnerConfig = {
  planningMaxAttempts: 3,
  maxSlides: 20,
  research: {
    maxSourcesPerSlide: 5,
    blockedDomains: DEFAULT_BLOCKED_DOMAINS,
    verifyLinks: false,
    linkTimeoutMs: 100,
    trustedSuffixes: ['.edu', '.gov'],
  },
};

function unscripted(name: string): never {
  throw new ToolError(name, 'not scripted');
}

function makeTools(overrides: Partial<DeckTools> = {}): DeckTools {
  return {
    searchWeb: async () => unscripted('search_web'),
    generateChart: async () => unscripted('generate_chart'),
    fetchImage: async () => unscripted('fetch_image'),
    createPresentation: async () => unscripted('create_presentation'),
    ...overrides,
  };
}

function makeRunner(
  replies: Array<string | Error>,
  tools: DeckTools = makeTools(),
  config: StageRunnerConfig = CONFIG,
) {
  const transport = scriptedTransport(replies);
  const runner = new StageRunner(new DeckLlmClient({ transport }), tools, config);
  const events: SubstepEvent[] = [];
  runner.setOnProgress((event) => events.push(event));
  return { runner, transport, events };
}

const OUTLINE: OutlineEntry[] = [
  { index: 0, title: 'History', searchQueries: ['space race history'], contentGoal: 'Origins' },
  { index: 1, title: 'Future', searchQueries: ['mars missions'], contentGoal: 'What comes next' },
];

const RESEARCH: ResearchSummary[] = [
  { slideIndex: 0, slideTitle: 'History', sources: [] },
  { slideIndex: 1, slideTitle: 'Future', sources: [] },
];

const REQUEST = { topic: 'Space Exploration', slideCount: 2 };

// ============================================================================
// REQUEST VALIDATION
// ============================================================================

describe('StageRunner.validateRequest', () => {
  const { runner } = makeRunner([]);

  it('trims the topic and drops a blank filename', () => {
    assert.deepEqual(
      runner.validateRequest({ topic: '  Space Exploration ', slideCount: 3, filename: '  ' }),
      { topic: 'Space Exploration', slideCount: 3 },
    );
  });

  for (const [label, request] of [
    ['empty topic', { topic: '   ', slideCount: 2 }],
    ['zero slides', { topic: 'Mars', slideCount: 0 }],
    ['fractional slides', { topic: 'Mars', slideCount: 2.5 }],
    ['too many slides', { topic: 'Mars', slideCount: 21 }],
  ] as const) {
    it(`rejects ${label}`, () => {
      assert.throws(() => runner.validateRequest(request), InvalidRequestError);
    });
  }
});

// ============================================================================
// PLANNING
// ============================================================================

describe('StageRunner.runPlanning', () => {
  it('indexes entries by position, ignoring the model numbering', async () => {
    const reply = JSON.stringify({
      slides: [
        { slide_number: 7, title: ' History ', search_queries: ['space race', ' '], content_goal: 'Origins' },
        { slide_number: 3, title: 'Future', search_queries: ['mars missions'] },
      ],
    });
    const { runner, transport } = makeRunner([reply]);

    const outline = await runner.runPlanning(REQUEST);

    assert.deepEqual(outline, [
      { index: 0, title: 'History', searchQueries: ['space race'], contentGoal: 'Origins' },
      { index: 1, title: 'Future', searchQueries: ['mars missions'], contentGoal: '' },
    ]);
    assert.equal(transport.requests.length, 1);
  });

  it('retries malformed output with the same input', async () => {
    const { runner, transport, events } = makeRunner(['not json', outlineJson(['History', 'Future'])]);

    const outline = await runner.runPlanning(REQUEST);

    assert.equal(outline.length, 2);
    assert.equal(transport.requests.length, 2);
    assert.equal(transport.requests[0]?.userMessage, transport.requests[1]?.userMessage);
    assert.deepEqual(
      events.filter((e) => e.type === 'completion_complete').map((e) => e.type === 'completion_complete' && e.ok),
      [false, true],
    );
  });

  it('retries an outline with the wrong slide count', async () => {
    const { runner, transport } = makeRunner([outlineJson(['Only one']), outlineJson(['History', 'Future'])]);

    const outline = await runner.runPlanning(REQUEST);

    assert.deepEqual(outline.map((e) => e.title), ['History', 'Future']);
    assert.equal(transport.requests.length, 2);
  });

  it('fails with PlanningFailed after the attempt bound', async () => {
    const bad = outlineJson(['Only one']);
    const { runner, transport } = makeRunner([bad, bad, bad, bad]);

    await assert.rejects(runner.runPlanning(REQUEST), (err: unknown) => {
      assert.ok(err instanceof PlanningFailedError);
      assert.equal(err.attempts, 3);
      assert.equal(err.issues.length, 3);
      assert.equal(err.message, 'No valid outline after 3 attempts: attempt 3: expected 2 slides, got 1');
      return true;
    });
    assert.equal(transport.requests.length, 3);
  });

  it('rejects entries without search queries', async () => {
    const noQueries = JSON.stringify({
      slides: [
        { title: 'History', search_queries: [], content_goal: '' },
        { title: 'Future', search_queries: ['mars'], content_goal: '' },
      ],
    });
    const { runner } = makeRunner([noQueries], makeTools(), { ...CONFIG, planningMaxAttempts: 1 });

    await assert.rejects(runner.runPlanning(REQUEST), (err: unknown) => {
      assert.ok(err instanceof PlanningFailedError);
      assert.deepEqual(err.issues, ['attempt 1: slide 1: no search queries']);
      return true;
    });
  });

  it('does not retry transport failures', async () => {
    const { runner, transport } = makeRunner([new Error('ECONNRESET'), outlineJson(['History', 'Future'])]);

    await assert.rejects(runner.runPlanning(REQUEST), CompletionTransportError);
    assert.equal(transport.requests.length, 1);
  });
});

// ============================================================================
// RESEARCH
// ============================================================================

describe('StageRunner.runResearch', () => {
  const hits: Record<string, RawSourceRecord[]> = {
    'moon facts': [
      { url: 'https://www.reddit.com/r/moon', confidence: 0.9 },
      { url: 'https://nasa.gov/moon?utm_source=x', confidence: 0.8 },
      { url: 'https://example.com/moon', confidence: 0.6 },
    ],
    'moon data': [
      { url: 'https://nasa.gov/moon#history', confidence: 0.4 },
      { url: 'https://mit.edu/moon', confidence: 0.7 },
    ],
  };
  const outline: OutlineEntry[] = [
    { index: 0, title: 'Mars', searchQueries: ['mars facts'], contentGoal: '' },
    { index: 1, title: 'Moon', searchQueries: ['moon facts', 'moon data'], contentGoal: '' },
  ];
  const tools = makeTools({
    searchWeb: async (query) => {
      if (query === 'mars facts') throw new ToolError('search_web', 'rate limited');
      return hits[query] ?? [];
    },
  });

  it('isolates a failed lookup to its own entry', async () => {
    const { runner, events } = makeRunner([], tools);

    const summaries = await runner.runResearch(outline);

    assert.deepEqual(summaries.map((s) => [s.slideIndex, s.slideTitle, s.sources.length]), [
      [0, 'Mars', 0],
      [1, 'Moon', 3],
    ]);
    const degraded = events.filter((e) => e.type === 'degraded');
    assert.equal(degraded.length, 1);
    assert.deepEqual(
      degraded[0],
      {
        type: 'degraded',
        stage: 'researching',
        slideIndex: 0,
        reason: `research for "Mars" failed: Tool 'search_web' failed: rate limited`,
      },
    );
  });

  it('drops blocked domains, dedupes by normalized URL and ranks', async () => {
    const { runner } = makeRunner([], tools);

    const [, moon] = await runner.runResearch(outline);

    assert.deepEqual(
      moon?.sources.map((s) => [s.url, s.score, s.tier]),
      [
        ['https://nasa.gov/moon', 95, 'S'],
        ['https://mit.edu/moon', 85, 'S'],
        ['https://example.com/moon', 60, 'A'],
      ],
    );
  });

  it('keeps at most maxSourcesPerSlide sources', async () => {
    const config = { ...CONFIG, research: { ...CONFIG.research, maxSourcesPerSlide: 2 } };
    const { runner } = makeRunner([], tools, config);

    const [, moon] = await runner.runResearch(outline);

    assert.deepEqual(moon?.sources.map((s) => s.url), ['https://nasa.gov/moon', 'https://mit.edu/moon']);
  });

  it('ranks unreachable sources last when links are verified', async () => {
    const config: StageRunnerConfig = {
      ...CONFIG,
      research: { ...CONFIG.research, verifyLinks: true },
      fetchPage: fakePages({
        'https://example.com/moon': { status: 200, body: '<html><head><meta name="author" content="A. Writer"></head></html>' },
        'https://mit.edu/moon': { status: 404, body: '' },
      }),
    };
    const { runner } = makeRunner([], tools, config);

    const [, moon] = await runner.runResearch(outline);

    assert.deepEqual(moon?.sources.map((s) => [s.url, s.status, s.tier]), [
      ['https://example.com/moon', 'live', 'A'],
      ['https://nasa.gov/moon', 'dead', 'C'],
      ['https://mit.edu/moon', 'dead', 'C'],
    ]);
  });
});

// ============================================================================
// DRAFTING
// ============================================================================

describe('StageRunner.runDrafting', () => {
  it('accepts a deck with one well-formed chart', async () => {
    const reply = draftJson(
      [
        { title: 'History', speaker_notes: 'Open strong', sources: ['https://nasa.gov/moon'] },
        { title: 'Future', visual_request: CHART_VISUAL },
      ],
      'space_exploration',
    );
    const { runner } = makeRunner([reply]);

    const content = await runner.runDrafting(REQUEST, OUTLINE, RESEARCH);

    assert.equal(content.filenameSuggestion, 'space_exploration');
    assert.deepEqual(content.slides[0], {
      title: 'History',
      points: ['First point', 'Second point', 'Third point'],
      sources: ['https://nasa.gov/moon'],
      speakerNotes: 'Open strong',
    });
    assert.deepEqual(content.slides[1]?.visualRequest, {
      type: 'chart',
      prompt: 'Launches per year',
      data: { labels: ['2021', '2022'], values: [135, 186] },
    });
  });

  it('fails with DraftingConstraintViolation when no slide has a chart', async () => {
    const reply = draftJson([
      { title: 'History', visual_request: { type: 'image', prompt: 'Saturn V launch' } },
      { title: 'Future' },
    ]);
    const { runner } = makeRunner([reply]);

    await assert.rejects(runner.runDrafting(REQUEST, OUTLINE, RESEARCH), DraftingConstraintViolationError);
  });

  it('drops a malformed chart before the deck-level check', async () => {
    const reply = draftJson([
      { title: 'History', visual_request: { type: 'chart', prompt: 'Bad', data: { labels: ['a', 'b'], values: [1] } } },
      { title: 'Future' },
    ]);
    const { runner, events } = makeRunner([reply]);

    await assert.rejects(runner.runDrafting(REQUEST, OUTLINE, RESEARCH), DraftingConstraintViolationError);
    assert.deepEqual(events.filter((e) => e.type === 'degraded').map((e) => e.type === 'degraded' && e.slideIndex), [0]);
  });

  it('keeps valid visuals when another slide has an invalid one', async () => {
    const reply = draftJson([
      { title: 'History', visual_request: { type: 'image', prompt: 'Rocket', data: { labels: ['a'], values: [1] } } },
      { title: 'Future', visual_request: CHART_VISUAL },
    ]);
    const { runner } = makeRunner([reply]);

    const content = await runner.runDrafting(REQUEST, OUTLINE, RESEARCH);

    assert.equal(content.slides[0]?.visualRequest, undefined);
    assert.equal(content.slides[1]?.visualRequest?.type, 'chart');
  });

  it('fails with DraftingFailed when the slide count differs from the outline', async () => {
    const { runner } = makeRunner([draftJson([{ title: 'Only', visual_request: CHART_VISUAL }])]);

    await assert.rejects(runner.runDrafting(REQUEST, OUTLINE, RESEARCH), (err: unknown) => {
      assert.ok(err instanceof DraftingFailedError);
      assert.equal(err.message, 'Drafting returned 1 slides for an outline of 2');
      return true;
    });
  });

  it('fails with DraftingFailed on output that is not a deck', async () => {
    const { runner } = makeRunner(['Sorry, I cannot draft this.']);

    await assert.rejects(runner.runDrafting(REQUEST, OUTLINE, RESEARCH), DraftingFailedError);
  });

  it('caps bullet points at five and requires three', async () => {
    const deck = (points: string[]) => JSON.stringify({
      slides: [
        { title: 'History', points, sources: [], visual_request: CHART_VISUAL },
        { title: 'Future', points: ['a', 'b', 'c'], sources: [] },
      ],
    });

    const { runner: longRunner } = makeRunner([deck(['1', '2', '3', '4', '5', '6'])]);
    const content = await longRunner.runDrafting(REQUEST, OUTLINE, RESEARCH);
    assert.deepEqual(content.slides[0]?.points, ['1', '2', '3', '4', '5']);

    const { runner: shortRunner } = makeRunner([deck(['1', ' '])]);
    await assert.rejects(shortRunner.runDrafting(REQUEST, OUTLINE, RESEARCH), DraftingFailedError);
  });
});

describe('parseVisualRequest', () => {
  it('accepts chart data serialized in data_json', () => {
    const result = parseVisualRequest(
      { type: 'Chart', prompt: 'Budget', data_json: '{"labels":["a","b"],"values":[1,2]}' },
      'Slide',
    );
    assert.deepEqual(result, { ok: true, request: { type: 'chart', prompt: 'Budget', data: { labels: ['a', 'b'], values: [1, 2] } } });
  });

  it('uses the slide title when a chart has no prompt', () => {
    const result = parseVisualRequest({ type: 'chart', data: { labels: ['a'], values: [1] } }, 'Budget by year');
    assert.deepEqual(result, { ok: true, request: { type: 'chart', prompt: 'Budget by year', data: { labels: ['a'], values: [1] } } });
  });

  it('rejects charts without data, empty charts and unknown types', () => {
    assert.deepEqual(parseVisualRequest({ type: 'chart', prompt: 'x' }, 's'), { ok: false, reason: 'chart request has no data' });
    assert.equal(parseVisualRequest({ type: 'chart', data: { labels: [], values: [] } }, 's').ok, false);
    assert.equal(parseVisualRequest({ type: 'chart', data_json: '{labels:' }, 's').ok, false);
    assert.deepEqual(parseVisualRequest({ type: 'video', prompt: 'x' }, 's'), { ok: false, reason: "unknown visual type 'video'" });
  });

  it('rejects images without a prompt', () => {
    assert.deepEqual(parseVisualRequest({ type: 'image', prompt: ' ' }, 's'), { ok: false, reason: 'image request has no prompt' });
  });
});

// ============================================================================
// ILLUSTRATION & ASSEMBLY
// ============================================================================

describe('StageRunner.runIllustration', () => {
  it('continues past a failed request and keeps slide indices', async () => {
    const tools = makeTools({
      generateChart: async (title) => `/out/${title}.png`,
      fetchImage: async (prompt) => {
        if (prompt === 'broken') throw new ToolError('fetch_image', 'no results');
        return `/out/${prompt}.jpg`;
      },
    });
    const { runner, events } = makeRunner([], tools);

    const assets = await runner.runIllustration([
      { slideIndex: 0, request: { type: 'chart', prompt: 'growth', data: { labels: ['a'], values: [1] } } },
      { slideIndex: 1, request: { type: 'image', prompt: 'broken' } },
      { slideIndex: 2, request: { type: 'image', prompt: 'nebula' } },
    ]);

    assert.deepEqual(assets, [
      { slideIndex: 0, filePath: '/out/growth.png' },
      { slideIndex: 2, filePath: '/out/nebula.jpg' },
    ]);
    assert.deepEqual(
      events.filter((e) => e.type === 'tool_result').map((e) => e.type === 'tool_result' && [e.toolName, e.isError]),
      [['generate_chart', false], ['fetch_image', true], ['fetch_image', false]],
    );
  });

  it('lets unexpected errors propagate', async () => {
    const tools = makeTools({
      generateChart: async () => {
        throw new TypeError('bug');
      },
    });
    const { runner } = makeRunner([], tools);

    await assert.rejects(
      runner.runIllustration([{ slideIndex: 0, request: { type: 'chart', prompt: 'x', data: { labels: ['a'], values: [1] } } }]),
      TypeError,
    );
  });
});

describe('StageRunner.runAssembly', () => {
  it('propagates an assembly failure', async () => {
    const tools = makeTools({
      createPresentation: async () => {
        throw new ToolError('create_presentation', 'Error creating PPT: disk full');
      },
    });
    const { runner } = makeRunner([], tools);

    await assert.rejects(runner.runAssembly('Deck', []), ToolError);
  });
});
