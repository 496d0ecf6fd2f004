import type { SectionValidator } from '../types.js';

const LIST_ITEM_PATTERN = /^\s*(?:[-*+•]|\d+[.)])\s+\S/;
const ORDERED_ITEM_PATTERN = /^\s*\d+[.)]\s+\S/;
const MILESTONE_PATTERN = /\b(?:phase|week|month|quarter|sprint|milestone|q[1-4])\s*\d*/i;

function nonEmptyLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

export function countListItems(text: string): number {
  return nonEmptyLines(text).filter((line) => LIST_ITEM_PATTERN.test(line)).length;
}

export function countMilestones(text: string): number {
  return nonEmptyLines(text).filter(
    (line) => ORDERED_ITEM_PATTERN.test(line) || (LIST_ITEM_PATTERN.test(line) && MILESTONE_PATTERN.test(line)),
  ).length;
}

/** Rejects output no role would accept: blank, a handful of words, or one line repeated over and over. */
export function checkDegenerate(text: string): string | null {
  const trimmed = text.trim();
  if (!trimmed) return 'Output is empty';

  const words = trimmed.toLowerCase().match(/[\p{L}\p{N}']+/gu) ?? [];
  if (new Set(words).size < 5) {
    return 'Output has fewer than 5 distinct words';
  }

  const lines = nonEmptyLines(trimmed);
  if (lines.length >= 4) {
    const counts = new Map<string, number>();
    for (const line of lines) {
      counts.set(line, (counts.get(line) ?? 0) + 1);
    }
    const mostRepeated = Math.max(...counts.values());
    if (mostRepeated > lines.length / 2) {
      return 'Output repeats the same line';
    }
  }

  return null;
}

export function minLength(min: number): SectionValidator {
  return (text) =>
    text.trim().length >= min ? null : `Expected at least ${min} characters, got ${text.trim().length}`;
}

export function minListItems(min: number, label = 'list items'): SectionValidator {
  return (text) => {
    const count = countListItems(text);
    return count >= min ? null : `Expected at least ${min} ${label}, got ${count}`;
  };
}

export function orderedMilestones(min: number): SectionValidator {
  return (text) => {
    const count = countMilestones(text);
    return count >= min ? null : `Expected at least ${min} ordered milestones, got ${count}`;
  };
}

export function allOf(...validators: SectionValidator[]): SectionValidator {
  return (text) => {
    for (const validate of validators) {
      const issue = validate(text);
      if (issue) return issue;
    }
    return null;
  };
}
