/**
 * Core type definitions for the hint tutor
 */

export type DocumentClass = 'material' | 'assignment';

/** Document handed over by a source before ingestion */
export interface DocumentInput {
  class: DocumentClass;
  filename: string;
  rawText: string;
}

export interface Document {
  readonly id: string;
  readonly class: DocumentClass;
  readonly filename: string;
  readonly rawText: string;
}

export interface QuestionFlags {
  readonly hasScenario: boolean;
  readonly hasTable: boolean;
  readonly hasImage: boolean;
}

export interface Question {
  readonly id: string;
  readonly sourceDocumentId: string;
  /** Numbering marker as written in the source, e.g. "3." or "Question 2" */
  readonly label: string;
  readonly text: string;
  readonly flags: QuestionFlags;
}

/**
 * Point-in-time view of the corpus. Replaced wholesale on every ingest,
 * never mutated after publication.
 */
export interface KnowledgeSnapshot {
  readonly materials: readonly Document[];
  readonly assignments: readonly Document[];
  readonly questions: readonly Question[];
  readonly builtAt: number;
}

export interface AssignmentQuestions {
  filename: string;
  questions: readonly Question[];
}

export type Role = 'user' | 'assistant';

export interface Turn {
  readonly role: Role;
  readonly content: string;
  readonly timestamp: number; // epoch ms
}

export interface Session {
  readonly id: string;
  readonly turns: readonly Turn[];
  readonly createdAt: number;
  readonly lastActivity: number;
}

export interface SessionInfo {
  sessionId: string;
  messageCount: number;
  createdAt: number;
  lastActivity: number;
  isExpired: boolean;
}

export interface SessionStats {
  totalSessions: number;
  activeSessions: number;
  totalMessages: number;
  avgMessagesPerSession: number;
}

export interface ContextBudget {
  maxKnowledgeChars: number;
}

export interface KnowledgeSelection {
  included: string[];
  omitted: string[];
  truncated: boolean;
}

export interface ContextPayload {
  systemInstructions: string;
  knowledgeText: string;
  historyWindow: string;
  newMessage: string;
  knowledge: KnowledgeSelection;
  estimatedTokens: number;
}
