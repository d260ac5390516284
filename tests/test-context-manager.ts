/**
 * Tests for context assembly
 * Whole-document knowledge budget, history window and token estimate
 */

import { describe, expect, it } from 'vitest';
import { ContextManager } from '../src/services/context-manager.js';
import type { Document, KnowledgeSnapshot, Session, Turn } from '../src/types/index.js';

const material: Document = { id: 'doc_001', class: 'material', filename: 'intro.pdf', rawText: 'A'.repeat(50) };
const assignment: Document = { id: 'doc_002', class: 'assignment', filename: 'hw1.pdf', rawText: 'B'.repeat(50) };

// "### Class Material: intro.pdf\n" is 30 characters, "### Assignment: hw1.pdf\n" is 24
const MATERIAL_BLOCK = `### Class Material: intro.pdf\n${'A'.repeat(50)}`;
const ASSIGNMENT_BLOCK = `### Assignment: hw1.pdf\n${'B'.repeat(50)}`;

const snapshot: KnowledgeSnapshot = {
  materials: [material],
  assignments: [assignment],
  questions: [],
  builtAt: 0
};

const emptySnapshot: KnowledgeSnapshot = { materials: [], assignments: [], questions: [], builtAt: 0 };

function sessionWith(turns: Turn[]): Session {
  return { id: 's1', turns, createdAt: 0, lastActivity: 0 };
}

describe('ContextManager', () => {
  const manager = new ContextManager('SYS');

  it('includes every document when the budget allows', () => {
    const payload = manager.build(sessionWith([]), snapshot, 'hi', { maxKnowledgeChars: 1000 });

    expect(MATERIAL_BLOCK).toHaveLength(80);
    expect(ASSIGNMENT_BLOCK).toHaveLength(74);
    expect(payload.knowledgeText).toBe(`${MATERIAL_BLOCK}\n\n${ASSIGNMENT_BLOCK}`);
    expect(payload.knowledge).toEqual({ included: ['intro.pdf', 'hw1.pdf'], omitted: [], truncated: false });
  });

  it('fits a budget equal to the full serialized length', () => {
    const payload = manager.build(sessionWith([]), snapshot, 'hi', { maxKnowledgeChars: 156 });
    expect(payload.knowledge.truncated).toBe(false);
  });

  it('drops whole trailing documents that overflow the budget', () => {
    const payload = manager.build(sessionWith([]), snapshot, 'hi', { maxKnowledgeChars: 155 });

    expect(payload.knowledgeText).toBe(MATERIAL_BLOCK);
    expect(payload.knowledge).toEqual({ included: ['intro.pdf'], omitted: ['hw1.pdf'], truncated: true });
  });

  it('includes nothing when the first document does not fit', () => {
    const payload = manager.build(sessionWith([]), snapshot, 'hi', { maxKnowledgeChars: 79 });

    expect(payload.knowledgeText).toBe('');
    expect(payload.knowledge.omitted).toEqual(['intro.pdf', 'hw1.pdf']);
  });

  it('handles an empty corpus', () => {
    const payload = manager.build(sessionWith([]), emptySnapshot, 'abcde', { maxKnowledgeChars: 1000 });

    expect(payload.knowledgeText).toBe('');
    expect(payload.knowledge).toEqual({ included: [], omitted: [], truncated: false });
    expect(payload.historyWindow).toBe('');
    // "SYS" -> 1 token, "abcde" -> 2 tokens
    expect(payload.estimatedTokens).toBe(3);
  });

  it('leaves the message being answered out of the history', () => {
    const turns: Turn[] = [
      { role: 'user', content: 'q1', timestamp: 1 },
      { role: 'assistant', content: 'a1', timestamp: 2 },
      { role: 'user', content: 'q2', timestamp: 3 }
    ];
    const payload = manager.build(sessionWith(turns), emptySnapshot, 'q2', { maxKnowledgeChars: 1000 });

    expect(payload.historyWindow).toBe('Student: q1\nAssistant: a1');
    expect(payload.newMessage).toBe('q2');
  });

  it('keeps a trailing user turn that differs from the new message', () => {
    const turns: Turn[] = [{ role: 'user', content: 'earlier', timestamp: 1 }];
    const payload = manager.build(sessionWith(turns), emptySnapshot, 'later', { maxKnowledgeChars: 1000 });

    expect(payload.historyWindow).toBe('Student: earlier');
  });

  it('builds identical payloads from identical inputs', () => {
    const session = sessionWith([{ role: 'user', content: 'q1', timestamp: 1 }]);
    const first = manager.build(session, snapshot, 'q1', { maxKnowledgeChars: 155 });
    const second = manager.build(session, snapshot, 'q1', { maxKnowledgeChars: 155 });

    expect(second).toEqual(first);
  });

  it('describes the payload with a per-section breakdown', () => {
    const payload = manager.build(sessionWith([]), snapshot, 'hi', { maxKnowledgeChars: 155 });
    const lines = manager.describe(payload).split('\n');

    expect(lines[1]).toBe('CONTEXT BREAKDOWN FOR THIS EXCHANGE');
    expect(lines).toContain('   Omitted: hw1.pdf');
  });
});
