/**
 * Knowledge Base Service
 * Holds the ingested corpus and publishes it as immutable snapshots
 */

import type {
  AssignmentQuestions,
  Document,
  DocumentInput,
  KnowledgeSnapshot,
  Question
} from '../types/index.js';
import { IngestionError } from '../utils/errors.js';
import { segment } from './question-segmenter.js';

/** Anything that can hand over extracted documents, e.g. a PDF directory pair */
export interface DocumentSource {
  load(): Promise<SourceLoadResult>;
}

export interface SourceLoadResult {
  documents: DocumentInput[];
  /** Documents the source could not read at all */
  failures: IngestionError[];
}

export interface IngestionReport {
  succeeded: number;
  skipped: number;
  failures: IngestionError[];
}

export interface KnowledgeSummary {
  materialsCount: number;
  assignmentsCount: number;
  totalPdfs: number;
  materials: string[];
  assignments: string[];
  errors: string[];
}

const MIN_READABLE_CHARS = 10;

const EMPTY_SNAPSHOT: KnowledgeSnapshot = Object.freeze({
  materials: Object.freeze([]),
  assignments: Object.freeze([]),
  questions: Object.freeze([]),
  builtAt: 0
});

export class KnowledgeBaseService {
  private snapshot: KnowledgeSnapshot = EMPTY_SNAPSHOT;
  private report: IngestionReport = { succeeded: 0, skipped: 0, failures: [] };
  private inFlight: Promise<IngestionReport> | undefined;

  constructor(private readonly clock: () => number = Date.now) {}

  /**
   * Build a brand-new snapshot from the given documents and publish it.
   * A document that cannot be processed is skipped and reported; the
   * previous snapshot stays visible until the new one is complete.
   */
  ingest(documents: readonly DocumentInput[], priorFailures: readonly IngestionError[] = []): KnowledgeSnapshot {
    const materials: Document[] = [];
    const assignments: Document[] = [];
    const questions: Question[] = [];
    const failures: IngestionError[] = [...priorFailures];

    documents.forEach((input, index) => {
      const id = `doc_${(index + 1).toString().padStart(3, '0')}`;
      try {
        if (input.rawText.replace(/\s/g, '').length < MIN_READABLE_CHARS) {
          throw new IngestionError(input.filename, input.class, 'no readable content');
        }

        const doc: Document = Object.freeze({
          id,
          class: input.class,
          filename: input.filename,
          rawText: input.rawText
        });

        if (doc.class === 'assignment') {
          // segment before pushing so a failing document leaves no partial state
          const parsed = segment(doc.rawText, doc.id);
          assignments.push(doc);
          questions.push(...parsed);
        } else {
          materials.push(doc);
        }
      } catch (error) {
        const failure = error instanceof IngestionError
          ? error
          : new IngestionError(input.filename, input.class, error instanceof Error ? error.message : String(error));
        failures.push(failure);
        console.warn(`[KB] Skipped ${failure.message}`);
      }
    });

    const next: KnowledgeSnapshot = Object.freeze({
      materials: Object.freeze(materials),
      assignments: Object.freeze(assignments),
      questions: Object.freeze(questions),
      builtAt: this.clock()
    });

    // publish: a single reference swap
    this.snapshot = next;
    this.report = {
      succeeded: materials.length + assignments.length,
      skipped: failures.length,
      failures
    };

    console.log(
      `[KB] Ingested ${materials.length} material(s), ${assignments.length} assignment(s), ` +
      `${questions.length} question(s); ${failures.length} skipped`
    );

    return next;
  }

  /**
   * Load from a source and ingest. Calls made while a refresh is running
   * share that refresh instead of starting a second writer.
   */
  refresh(source: DocumentSource): Promise<IngestionReport> {
    if (this.inFlight) return this.inFlight;

    const run = async (): Promise<IngestionReport> => {
      const { documents, failures } = await source.load();
      this.ingest(documents, failures);
      return this.report;
    };

    this.inFlight = run().finally(() => {
      this.inFlight = undefined;
    });
    return this.inFlight;
  }

  currentSnapshot(): KnowledgeSnapshot {
    return this.snapshot;
  }

  /**
   * Questions grouped per assignment, in ingestion order then order of appearance
   */
  listAssignmentQuestions(): AssignmentQuestions[] {
    const { assignments, questions } = this.snapshot;
    return assignments
      .map(doc => ({
        filename: doc.filename,
        questions: questions.filter(q => q.sourceDocumentId === doc.id)
      }))
      .filter(group => group.questions.length > 0);
  }

  getReport(): IngestionReport {
    return this.report;
  }

  getSummary(): KnowledgeSummary {
    const { materials, assignments } = this.snapshot;
    return {
      materialsCount: materials.length,
      assignmentsCount: assignments.length,
      totalPdfs: materials.length + assignments.length,
      materials: materials.map(d => d.filename),
      assignments: assignments.map(d => d.filename),
      errors: this.report.failures.map(f => f.message)
    };
  }

  hasContent(): boolean {
    return this.snapshot.materials.length > 0 || this.snapshot.assignments.length > 0;
  }
}
