import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  collectVisualRequests,
  reconcileSlides,
  resolveBaseFilename,
  sanitizeFilename,
} from '../assembly-reconciler.ts';
import type { GeneratedAsset, SlideContent } from '../types.ts';

const slides: SlideContent[] = [
  { title: 'Intro', points: ['a', 'b', 'c'], sources: [], speakerNotes: 'Welcome' },
  {
    title: 'Budget',
    points: ['d', 'e', 'f'],
    sources: ['https://nasa.gov/budget'],
    visualRequest: { type: 'chart', prompt: 'Budget', data: { labels: ['2023'], values: [25.4] } },
  },
  { title: 'Crew', points: ['g', 'h', 'i'], sources: [], visualRequest: { type: 'image', prompt: 'astronauts' } },
];

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items];
  return items.flatMap((item, i) =>
    permutations([...items.slice(0, i), ...items.slice(i + 1)]).map((rest) => [item, ...rest]),
  );
}

describe('collectVisualRequests', () => {
  it('addresses requests by slide position', () => {
    assert.deepEqual(collectVisualRequests(slides).map((r) => [r.slideIndex, r.request.type]), [
      [1, 'chart'],
      [2, 'image'],
    ]);
  });
});

describe('reconcileSlides', () => {
  it('left-joins assets by slide index', () => {
    const payload = reconcileSlides(slides, [{ slideIndex: 1, filePath: '/out/chart.png' }]);

    assert.deepEqual(payload, [
      { title: 'Intro', points: ['a', 'b', 'c'], image: null, speaker_notes: 'Welcome', sources: [] },
      { title: 'Budget', points: ['d', 'e', 'f'], image: '/out/chart.png', sources: ['https://nasa.gov/budget'] },
      { title: 'Crew', points: ['g', 'h', 'i'], image: null, sources: [] },
    ]);
  });

  it('produces the same payload for every asset order', () => {
    const assets: GeneratedAsset[] = [
      { slideIndex: 2, filePath: '/out/crew.jpg' },
      { slideIndex: 0, filePath: '/out/intro.jpg' },
      { slideIndex: 1, filePath: '/out/chart.png' },
    ];

    for (const order of permutations(assets)) {
      const payload = reconcileSlides(slides, order);
      assert.deepEqual(payload.map((s) => [s.title, s.image]), [
        ['Intro', '/out/intro.jpg'],
        ['Budget', '/out/chart.png'],
        ['Crew', '/out/crew.jpg'],
      ]);
    }
  });

  it('ignores assets that point outside the deck', () => {
    const payload = reconcileSlides(slides, [{ slideIndex: 7, filePath: '/out/stray.png' }]);
    assert.deepEqual(payload.map((s) => s.image), [null, null, null]);
  });

  it('does not share arrays with the drafted slides', () => {
    const [first] = reconcileSlides(slides, []);
    assert.notEqual(first?.points, slides[0]?.points);
  });
});

describe('sanitizeFilename', () => {
  it('replaces spaces and strips unsafe characters', () => {
    assert.equal(sanitizeFilename('Space Exploration'), 'Space_Exploration');
    assert.equal(sanitizeFilename('  AI: trends / 2026!  '), 'AI_trends__2026');
    assert.equal(sanitizeFilename('report.pptx'), 'report');
    assert.equal(sanitizeFilename('???'), '');
  });
});

describe('resolveBaseFilename', () => {
  it('prefers the caller filename, then the suggestion, then the topic', () => {
    const topicOnly = { topic: 'Space Exploration', slideCount: 2 };

    assert.equal(resolveBaseFilename({ ...topicOnly, filename: 'my deck' }, { filenameSuggestion: 'space_101' }), 'my_deck');
    assert.equal(resolveBaseFilename(topicOnly, { filenameSuggestion: 'space_101' }), 'space_101');
    assert.equal(resolveBaseFilename(topicOnly, { filenameSuggestion: '' }), 'Space_Exploration');
    assert.equal(resolveBaseFilename({ topic: '???', slideCount: 1 }, { filenameSuggestion: '!!' }), 'presentation');
  });
});
