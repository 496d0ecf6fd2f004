import { describe, expect, it } from 'vitest';
import {
  allOf,
  checkDegenerate,
  countListItems,
  countMilestones,
  minLength,
  minListItems,
  orderedMilestones,
} from '../src/agents/validators.js';

describe('checkDegenerate', () => {
  it('rejects empty output', () => {
    expect(checkDegenerate('   \n ')).toBe('Output is empty');
  });

  it('rejects output with too few distinct words', () => {
    expect(checkDegenerate('ok ok ok fine fine')).toBe('Output has fewer than 5 distinct words');
  });

  it('rejects a line repeated for most of the output', () => {
    const text = ['Same line of generated text', 'Same line of generated text', 'Same line of generated text', 'Another line here'].join('\n');
    expect(checkDegenerate(text)).toBe('Output repeats the same line');
  });

  it('accepts ordinary prose', () => {
    expect(checkDegenerate('The platform lets owners send invoices and track payments.')).toBeNull();
  });
});

describe('list counting', () => {
  const text = ['Intro paragraph.', '- first', '* second', '+ third', '1. fourth', '2) fifth', '-not a bullet'].join('\n');

  it('counts bullet and numbered items', () => {
    expect(countListItems(text)).toBe(5);
  });

  it('counts numbered items and bullets that name a milestone', () => {
    const timeline = ['- Phase 1: discovery', '- polish', '1. build', 'Week 3 review'].join('\n');
    expect(countMilestones(timeline)).toBe(2);
  });
});

describe('validator combinators', () => {
  it('reports the length shortfall', () => {
    expect(minLength(10)('short')).toBe('Expected at least 10 characters, got 5');
    expect(minLength(5)('  short  ')).toBeNull();
  });

  it('reports missing list items with the given label', () => {
    expect(minListItems(2, 'risks')('- only one')).toBe('Expected at least 2 risks, got 1');
  });

  it('reports missing milestones', () => {
    expect(orderedMilestones(2)('1. kickoff')).toBe('Expected at least 2 ordered milestones, got 1');
  });

  it('returns the first failing issue', () => {
    const validate = allOf(minLength(3), minListItems(1));
    expect(validate('ab')).toBe('Expected at least 3 characters, got 2');
    expect(validate('abc')).toBe('Expected at least 1 list items, got 0');
    expect(validate('- abc')).toBeNull();
  });
});
