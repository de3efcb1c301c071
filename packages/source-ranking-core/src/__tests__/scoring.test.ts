import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { sanitizeConfidence, scoreSource, tierForScore } from '../scoring.ts';

const NONE = { hasReferences: false };

describe('scoreSource', () => {
  it('uses provider confidence as base points', () => {
    assert.equal(scoreSource('https://example.com/a', 0.5, NONE), 50);
  });

  it('adds author and date bonuses', () => {
    const signals = { author: 'A', date: '2025-01-01', hasReferences: false };
    assert.equal(scoreSource('https://example.com/a', 0.5, signals), 65);
  });

  it('adds the trusted-domain bonus for .edu and .gov hosts', () => {
    assert.equal(scoreSource('https://mit.edu/x', 0.7, { author: 'B', hasReferences: false }), 95);
    assert.equal(scoreSource('https://data.census.gov/t', 0.3, NONE), 45);
  });

  it('does not treat references as a score bonus', () => {
    assert.equal(scoreSource('https://example.com/a', 0.6, { hasReferences: true }), 60);
  });

  it('honours custom trusted suffixes', () => {
    assert.equal(scoreSource('https://ox.ac.uk/p', 0.5, NONE, ['.ac.uk']), 65);
    assert.equal(scoreSource('https://mit.edu/p', 0.5, NONE, ['.ac.uk']), 50);
  });

  it('clamps at 100', () => {
    const signals = { author: 'A', date: 'today', hasReferences: true };
    assert.equal(scoreSource('https://nasa.gov/m', 0.95, signals), 100);
  });

  it('strictly increases with confidence until clamped', () => {
    let previous = -1;
    for (let i = 0; i <= 10; i++) {
      const score = scoreSource('https://example.com/a', i / 10, NONE);
      assert.ok(score > previous, `score ${score} at confidence ${i / 10} not above ${previous}`);
      previous = score;
    }
  });

  it('is deterministic', () => {
    const signals = { author: 'A', hasReferences: false };
    assert.equal(
      scoreSource('https://example.org/x', 0.42, signals),
      scoreSource('https://example.org/x', 0.42, signals),
    );
  });
});

describe('tierForScore', () => {
  it('maps boundaries', () => {
    assert.equal(tierForScore(100), 'S');
    assert.equal(tierForScore(80), 'S');
    assert.equal(tierForScore(79.99), 'A');
    assert.equal(tierForScore(60), 'A');
    assert.equal(tierForScore(59.99), 'B');
    assert.equal(tierForScore(0), 'B');
  });
});

describe('sanitizeConfidence', () => {
  it('defaults non-numeric values to 0.5', () => {
    assert.equal(sanitizeConfidence(undefined), 0.5);
    assert.equal(sanitizeConfidence('0.9'), 0.5);
    assert.equal(sanitizeConfidence(Number.NaN), 0.5);
  });

  it('clamps into [0, 1]', () => {
    assert.equal(sanitizeConfidence(1.4), 1);
    assert.equal(sanitizeConfidence(-0.2), 0);
    assert.equal(sanitizeConfidence(0.33), 0.33);
  });
});
