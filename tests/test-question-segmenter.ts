/**
 * Tests for assignment question segmentation and flag detection
 */

import { describe, expect, it } from 'vitest';
import { detectFlags, isActualQuestion, markerOf, segment } from '../src/services/question-segmenter.js';

describe('markerOf', () => {
  it('recognizes the supported numbering styles', () => {
    expect(markerOf('Problem 3) Compute the ratio')).toBe('Problem 3)');
    expect(markerOf('Question 2 Why do firms borrow?')).toBe('Question 2');
    expect(markerOf('12) Define equity')).toBe('12)');
    expect(markerOf('iv. bonus shares')).toBe('iv.');
    expect(markerOf('b) Describe the entry')).toBe('b)');
  });

  it('ignores lines that only look numbered', () => {
    expect(markerOf('Revenue grew last year')).toBeUndefined();
    expect(markerOf('1.5 million units were sold')).toBeUndefined();
  });
});

describe('isActualQuestion', () => {
  it('accepts question marks, interrogatives and task verbs', () => {
    expect(isActualQuestion('Is this an asset?')).toBe(true);
    expect(isActualQuestion('3. What is an asset')).toBe(true);
    expect(isActualQuestion('Prepare a journal entry for the sale')).toBe(true);
  });

  it('rejects transaction lines', () => {
    expect(isActualQuestion('Purchased equipment for $2,000')).toBe(false);
    expect(isActualQuestion('The company had $10,000 in cash at year end')).toBe(false);
  });

  it('rejects long statements that ask nothing', () => {
    expect(isActualQuestion('The firm operates in many regions. '.repeat(4))).toBe(false);
  });
});

describe('detectFlags', () => {
  it('spots tabular lines', () => {
    expect(detectFlags('Compute totals\nCash | 100 | 200', false).hasTable).toBe(true);
    expect(detectFlags('Compute totals\nCash\t100\t200', false).hasTable).toBe(true);
  });

  it('carries a scenario seen earlier in the document', () => {
    expect(detectFlags('What is depreciation?', true)).toEqual({
      hasScenario: true,
      hasTable: false,
      hasImage: false
    });
  });
});

describe('segment', () => {
  it('splits numbered questions and skips transaction items', () => {
    const text = [
      'Case study: Acme Ltd runs a small shop.',
      '1. What is the purpose of a trial balance?',
      '2. Explain how the figure below shows revenue.',
      '3. Invested $5,000 in cash.',
      '4. Calculate net income using the table.'
    ].join('\n');

    const questions = segment(text, 'doc_001');

    expect(questions.map(q => q.label)).toEqual(['1.', '2.', '4.']);
    expect(questions.map(q => q.id)).toEqual(['doc_001#q1', 'doc_001#q2', 'doc_001#q3']);
    expect(questions[0]?.flags).toEqual({ hasScenario: true, hasTable: true, hasImage: false });
    expect(questions[1]?.flags).toEqual({ hasScenario: true, hasTable: false, hasImage: true });
    expect(questions[2]?.flags).toEqual({ hasScenario: true, hasTable: true, hasImage: false });
    expect(questions[2]?.sourceDocumentId).toBe('doc_001');
  });

  it('folds short roman sub-items into the open question', () => {
    const text = [
      'Question 1: Explain the following terms:',
      'i) goodwill',
      'ii) bonus shares',
      'Question 2 Why do firms issue debentures?'
    ].join('\n');

    const questions = segment(text, 'doc_002');

    expect(questions).toHaveLength(2);
    expect(questions[0]?.label).toBe('Question 1:');
    expect(questions[0]?.text).toBe('Question 1: Explain the following terms:\ni) goodwill\nii) bonus shares');
    expect(questions[0]?.flags).toEqual({ hasScenario: false, hasTable: false, hasImage: false });
    expect(questions[1]?.label).toBe('Question 2');
    expect(questions[1]?.text).toBe('Question 2 Why do firms issue debentures?');
  });

  it('folds sub-items that open with a listing verb', () => {
    const text = [
      'Question 1: Explain the following terms:',
      'i) goodwill',
      'ii) list two examples of intangible assets'
    ].join('\n');

    const questions = segment(text, 'doc_008');

    expect(questions).toHaveLength(1);
    expect(questions[0]?.text).toBe(text);
  });

  it('starts a new question at a roman item that opens with an imperative', () => {
    const questions = segment('Question 1: Describe the ledger.\ni) Explain debits.', 'doc_009');

    expect(questions.map(q => q.label)).toEqual(['Question 1:', 'i)']);
    expect(questions[1]?.text).toBe('i) Explain debits.');
  });

  it('flags scenarios only for questions that follow them', () => {
    const text = ['1. What is an asset?', '2. Purchased equipment for $2,000.', '3. What is a liability?'].join('\n');

    const questions = segment(text, 'doc_010');

    expect(questions.map(q => q.flags.hasScenario)).toEqual([false, true]);
  });

  it('treats a long unnumbered preamble as a scenario', () => {
    const preamble = 'Northwind Traders sells office supplies to local businesses. '.repeat(4);
    const questions = segment(`${preamble}\n1. How should revenue be recognised?`, 'doc_003');

    expect(questions).toHaveLength(1);
    expect(questions[0]?.flags.hasScenario).toBe(true);
  });

  it('leaves scenario flags off when nothing precedes the question', () => {
    const questions = segment('1. What is depreciation?', 'doc_004');
    expect(questions[0]?.flags.hasScenario).toBe(false);
  });

  it('appends continuation lines to the open question', () => {
    const questions = segment('1. Describe the accrual basis\nof accounting in your own words.', 'doc_005');
    expect(questions[0]?.text).toBe('1. Describe the accrual basis\nof accounting in your own words.');
  });

  it('returns nothing for text without numbered items', () => {
    expect(segment('', 'doc_006')).toEqual([]);
    expect(segment('General instructions for the course.', 'doc_006')).toEqual([]);
  });

  it('is deterministic', () => {
    const text = '1. What is an asset?\n2. Define liability.';
    expect(segment(text, 'doc_007')).toEqual(segment(text, 'doc_007'));
  });
});
