/**
 * Context Manager - assembles the per-turn model context
 * System instructions + class materials within a character budget +
 * session history + the new message
 */

import type {
  ContextBudget,
  ContextPayload,
  Document,
  KnowledgeSelection,
  KnowledgeSnapshot,
  Session,
  Turn
} from '../types/index.js';
import { HINT_SYSTEM_PROMPT } from '../prompts/hint-prompts.js';
import { TokenCounter } from '../utils/token-counter.js';

const DOCUMENT_SEPARATOR = '\n\n';

export class ContextManager {
  constructor(private readonly systemInstructions: string = HINT_SYSTEM_PROMPT) {}

  /**
   * Build the payload for one model call. Reads its inputs and never
   * mutates them; identical inputs give an identical payload.
   */
  build(
    session: Session,
    snapshot: KnowledgeSnapshot,
    newMessage: string,
    budget: ContextBudget
  ): ContextPayload {
    const { text: knowledgeText, selection } = this.selectKnowledge(snapshot, budget.maxKnowledgeChars);
    const historyWindow = this.formatHistory(this.historyTurns(session.turns, newMessage));

    const sections = {
      systemInstructions: this.systemInstructions,
      knowledgeText,
      historyWindow,
      newMessage
    };

    return {
      ...sections,
      knowledge: selection,
      estimatedTokens: TokenCounter.countPayload(sections)
    };
  }

  /**
   * Render a size breakdown of a payload for debug output
   */
  describe(payload: ContextPayload): string {
    const lines: string[] = [];
    lines.push('='.repeat(60));
    lines.push('CONTEXT BREAKDOWN FOR THIS EXCHANGE');
    lines.push('='.repeat(60));
    lines.push(`System instructions: ${TokenCounter.countText(payload.systemInstructions)} tokens`);
    lines.push(`Knowledge:           ${TokenCounter.countText(payload.knowledgeText)} tokens (${payload.knowledge.included.length} document(s))`);
    if (payload.knowledge.truncated) {
      lines.push(`   Omitted: ${payload.knowledge.omitted.join(', ')}`);
    }
    lines.push(`History:             ${TokenCounter.countText(payload.historyWindow)} tokens`);
    lines.push(`New message:         ${TokenCounter.countText(payload.newMessage)} tokens`);
    lines.push(`TOTAL:               ${payload.estimatedTokens} tokens`);
    lines.push('='.repeat(60));
    return lines.join('\n');
  }

  /**
   * Whole documents, materials first, until the next one would overflow
   * the budget. Stopping at the first misfit keeps the text a prefix of
   * the full serialization.
   */
  private selectKnowledge(
    snapshot: KnowledgeSnapshot,
    maxChars: number
  ): { text: string; selection: KnowledgeSelection } {
    const ordered = [...snapshot.materials, ...snapshot.assignments];
    const blocks: string[] = [];
    const included: string[] = [];
    let used = 0;

    for (const doc of ordered) {
      const block = this.formatDocument(doc);
      const cost = block.length + (blocks.length > 0 ? DOCUMENT_SEPARATOR.length : 0);
      if (used + cost > maxChars) break; // Budget exhausted
      blocks.push(block);
      included.push(doc.filename);
      used += cost;
    }

    const omitted = ordered.slice(included.length).map(doc => doc.filename);
    return {
      text: blocks.join(DOCUMENT_SEPARATOR),
      selection: { included, omitted, truncated: omitted.length > 0 }
    };
  }

  private formatDocument(doc: Document): string {
    const heading = doc.class === 'material' ? 'Class Material' : 'Assignment';
    return `### ${heading}: ${doc.filename}\n${doc.rawText}`;
  }

  /**
   * The message being answered travels separately, so a trailing user turn
   * carrying the same text is left out of the history.
   */
  private historyTurns(turns: readonly Turn[], newMessage: string): readonly Turn[] {
    const last = turns[turns.length - 1];
    if (last && last.role === 'user' && last.content === newMessage) {
      return turns.slice(0, -1);
    }
    return turns;
  }

  private formatHistory(turns: readonly Turn[]): string {
    return turns
      .map(turn => `${turn.role === 'user' ? 'Student' : 'Assistant'}: ${turn.content}`)
      .join('\n');
  }
}
