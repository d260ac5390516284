/**
 * Question Segmenter
 * Splits assignment text into numbered questions and flags the ones that
 * lean on a scenario, a table or an image.
 *
 * Pure string processing: no PDF structure is consulted, only the extracted
 * text, so the rule can be exercised without any document at hand.
 */

import type { Question, QuestionFlags } from '../types/index.js';

/** Tried in order; the first match labels the segment. */
const MARKER_PATTERNS: readonly RegExp[] = [
  /^((?:question|problem|exercise)\s+\d+[.):]?)(?:\s|$)/i,
  /^(\d+[.)])\s+/,
  /^([ivx]+[.)])\s+/i,
  /^([a-z][.)])\s+/i,
];

const ROMAN_LABEL = /^[ivx]+[.)]$/i;

const INTERROGATIVES = new Set(['what', 'why', 'how', 'when', 'where', 'who', 'which']);

// Imperatives that make a roman-numbered line a question of its own
const SUB_ITEM_BREAKERS = new Set([
  'explain', 'describe', 'define', 'compare', 'discuss',
  'analyze', 'evaluate', 'calculate', 'prepare', 'compute'
]);

const TASK_VERBS = new Set([
  'explain', 'describe', 'define', 'compare', 'discuss',
  'analyze', 'evaluate', 'calculate', 'prepare', 'compute',
  'determine', 'identify', 'list', 'state', 'illustrate',
  'justify', 'prove', 'show', 'demonstrate', 'outline'
]);

// Past-tense bookkeeping verbs that open transaction lists rather than questions
const TRANSACTION_VERBS = [
  'invested', 'purchased', 'paid', 'received', 'sold',
  'bought', 'acquired', 'issued', 'collected', 'borrowed',
  'provided', 'completed', 'recorded', 'transferred'
];

const SCENARIO_PHRASES = [
  'following scenario',
  'case study',
  'consider the following',
  'given the following',
  'background:',
  'context:',
  'scenario:'
];

const TABLE_REFERENCE = /\btables?\b|trial balance|balance sheet|given below|following data|using the data/;
const IMAGE_REFERENCE = /\b(?:figures?|diagrams?|charts?|graphs?|images?|pictures?|illustrations?|shown)\b|\bfig\./;

export function markerOf(line: string): string | undefined {
  for (const pattern of MARKER_PATTERNS) {
    const match = pattern.exec(line);
    if (match) return match[1];
  }
  return undefined;
}

function stripMarker(text: string): string {
  const label = markerOf(text);
  return label === undefined ? text : text.slice(label.length).trimStart();
}

function firstWord(text: string): string {
  const word = text.split(/\s+/, 1)[0] ?? '';
  return word.toLowerCase().replace(/[^a-z]/g, '');
}

function mentionsTransaction(lower: string): boolean {
  return TRANSACTION_VERBS.some(verb => lower.includes(verb));
}

function hasScenarioPhrase(lower: string): boolean {
  return SCENARIO_PHRASES.some(phrase => lower.includes(phrase));
}

/**
 * Decide whether a numbered item asks something, as opposed to listing
 * a fact or transaction that belongs to a scenario.
 */
export function isActualQuestion(text: string): boolean {
  if (text.includes('?')) return true;

  const word = firstWord(stripMarker(text));
  if (INTERROGATIVES.has(word) || TASK_VERBS.has(word)) return true;
  if (TRANSACTION_VERBS.includes(word)) return false;
  if (text.slice(0, 50).includes('$')) return false;

  if (text.length < 100) {
    return !mentionsTransaction(text.toLowerCase()) && !text.includes('$');
  }
  return false;
}

/**
 * Short roman-numbered lines like "ii) bonus shares" continue the open
 * question instead of starting a new one.
 */
function isSubItem(label: string, line: string): boolean {
  if (!ROMAN_LABEL.test(label) || line.length >= 100) return false;
  const word = firstWord(stripMarker(line));
  return !INTERROGATIVES.has(word) && !SUB_ITEM_BREAKERS.has(word);
}

function isScenarioLine(line: string): boolean {
  if (hasScenarioPhrase(line.toLowerCase())) return true;
  return line.length > 200 && !isActualQuestion(line);
}

function hasTabularLine(text: string): boolean {
  return text.split('\n').some(line =>
    (line.match(/\|/g)?.length ?? 0) >= 2 || line.split('\t').length >= 3
  );
}

export function detectFlags(text: string, scenarioSeen: boolean): QuestionFlags {
  const lower = text.toLowerCase();
  return {
    hasScenario: scenarioSeen || hasScenarioPhrase(lower),
    hasTable: TABLE_REFERENCE.test(lower) || hasTabularLine(text),
    hasImage: IMAGE_REFERENCE.test(lower)
  };
}

/**
 * Segment raw assignment text into questions, in order of appearance.
 * Question ids are `<sourceDocumentId>#q<n>`, numbered from 1.
 */
export function segment(rawText: string, sourceDocumentId: string): Question[] {
  const questions: Question[] = [];
  let open: { label: string; lines: string[] } | undefined;
  let scenarioSeen = false;

  const close = (): void => {
    if (!open) return;
    const text = open.lines.join('\n');
    if (isActualQuestion(text)) {
      questions.push(Object.freeze({
        id: `${sourceDocumentId}#q${questions.length + 1}`,
        sourceDocumentId,
        label: open.label,
        text,
        flags: Object.freeze(detectFlags(text, scenarioSeen))
      }));
    } else {
      // numbered item that states rather than asks: scenario material
      scenarioSeen = true;
    }
    open = undefined;
  };

  for (const rawLine of rawText.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const label = markerOf(line);
    if (label === undefined) {
      if (open) {
        open.lines.push(line);
      } else if (isScenarioLine(line)) {
        scenarioSeen = true;
      }
      continue;
    }

    if (open && isSubItem(label, line)) {
      open.lines.push(line);
      continue;
    }

    close();
    open = { label, lines: [line] };
  }
  close();

  return questions;
}
