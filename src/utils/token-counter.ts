/**
 * Token counter utility
 * Uses simple character-based approximation: 1 token ≈ 4 characters
 */

import type { ContextPayload } from '../types/index.js';

export class TokenCounter {
  private static readonly CHARS_PER_TOKEN = 4;

  /**
   * Estimate tokens for a text string
   */
  static countText(text: string): number {
    return Math.ceil(text.length / this.CHARS_PER_TOKEN);
  }

  /**
   * Estimate tokens for every text section of an assembled payload
   */
  static countPayload(
    payload: Pick<ContextPayload, 'systemInstructions' | 'knowledgeText' | 'historyWindow' | 'newMessage'>
  ): number {
    return (
      this.countText(payload.systemInstructions) +
      this.countText(payload.knowledgeText) +
      this.countText(payload.historyWindow) +
      this.countText(payload.newMessage)
    );
  }
}
