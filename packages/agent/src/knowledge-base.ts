/**
 * KnowledgeBase - what the agent has proven about the board
 *
 * Holds the visited cells, the cells proven mined or safe, and the live
 * sentence collection. Every observation is followed by propagation to a
 * fixpoint:
 *
 *   DISCLOSE → MARK → RETIRE → RESOLVE → (repeat until nothing changes)
 */

import {
  CellSchema,
  CellSet,
  DimensionsSchema,
  SweepError,
  addTrace,
  cellKey,
  cellToString,
  isInBounds,
  neighbors,
  observationSchemaFor,
  parseWith,
  type Cell,
  type CellKey,
  type Dimensions,
  type ReadonlyCellSet,
  type TraceEntry,
  type TraceStage,
} from '@sweepmind/core';
import { Sentence } from './sentence.js';

// =============================================================================
// Configuration
// =============================================================================

export interface KnowledgeBaseConfig {
  height: number;
  width: number;
  /** Record observe and pass entries in the trace */
  trace?: boolean;
  /** Assert the knowledge base invariants after every pass */
  checkInvariants?: boolean;
}

const DEFAULT_CONFIG = {
  trace: false,
  checkInvariants: true,
};

// =============================================================================
// Propagation Report
// =============================================================================

export interface PropagationReport {
  /** Passes run, including the final pass that changed nothing */
  passes: number;
  /** Cells proven to be mines, in the order they were proven */
  minesFound: Cell[];
  /** Cells proven to be safe, in the order they were proven */
  safesFound: Cell[];
  /** Sentences added by subset resolution */
  derived: number;
  /** Empty or duplicate sentences dropped */
  retired: number;
}

function emptyReport(): PropagationReport {
  return { passes: 0, minesFound: [], safesFound: [], derived: 0, retired: 0 };
}

// =============================================================================
// KnowledgeBase
// =============================================================================

export class KnowledgeBase {
  readonly dimensions: Dimensions;
  private config: Required<Omit<KnowledgeBaseConfig, 'height' | 'width'>>;
  private observationSchema: ReturnType<typeof observationSchemaFor>;

  private visited = new CellSet();
  private provenMines = new CellSet();
  private provenSafes = new CellSet();
  private knowledge: Sentence[] = [];
  private observed: Map<CellKey, number> = new Map();
  private traceLog: TraceEntry[] = [];

  constructor(config: KnowledgeBaseConfig) {
    this.dimensions = parseWith(DimensionsSchema, { height: config.height, width: config.width }, 'INVALID_CONFIG');
    this.config = {
      trace: config.trace ?? DEFAULT_CONFIG.trace,
      checkInvariants: config.checkInvariants ?? DEFAULT_CONFIG.checkInvariants,
    };
    this.observationSchema = observationSchemaFor(this.dimensions);
  }

  // ---------------------------------------------------------------------------
  // Read-only accessors (copies)
  // ---------------------------------------------------------------------------

  get mines(): ReadonlyCellSet {
    return this.provenMines.clone();
  }

  get safes(): ReadonlyCellSet {
    return this.provenSafes.clone();
  }

  get movesMade(): ReadonlyCellSet {
    return this.visited.clone();
  }

  get sentences(): Sentence[] {
    return this.knowledge.map(s => s.clone());
  }

  get trace(): TraceEntry[] {
    return [...this.traceLog];
  }

  /** Count reported for a visited cell */
  observedCount(c: Cell): number | undefined {
    return this.observed.get(cellKey(c));
  }

  isMine(c: Cell): boolean {
    return this.provenMines.has(c);
  }

  isSafe(c: Cell): boolean {
    return this.provenSafes.has(c);
  }

  isVisited(c: Cell): boolean {
    return this.visited.has(c);
  }

  // ---------------------------------------------------------------------------
  // Facts
  // ---------------------------------------------------------------------------

  /** Records a mine proven outside propagation; rejects a proven safe cell */
  markMine(c: Cell): void {
    const target = this.parseFact(c, 'mine');
    this.applyMine(target);
  }

  /** Records a safe cell proven outside propagation; rejects a proven mine */
  markSafe(c: Cell): void {
    const target = this.parseFact(c, 'safe');
    this.applySafe(target);
  }

  /**
   * Record that a safe cell was revealed with `count` neighbouring mines,
   * then propagate to a fixpoint. A rejected observation leaves the
   * knowledge base as it was.
   */
  observe(c: Cell, count: number): PropagationReport {
    return this.atomically(() => this.applyObservation(c, count));
  }

  private applyObservation(c: Cell, count: number): PropagationReport {
    const started = performance.now();
    const obs = parseWith(this.observationSchema, { cell: c, count }, 'INVALID_OBSERVATION');
    const target: Cell = { row: obs.cell.row, col: obs.cell.col };

    if (this.provenMines.has(target)) {
      throw new SweepError(`Revealed ${cellToString(target)} is a proven mine`, 'CONTRADICTION', {
        cell: target,
      });
    }

    const previous = this.observed.get(cellKey(target));
    if (previous !== undefined) {
      if (previous !== obs.count) {
        throw new SweepError(
          `${cellToString(target)} was observed with count ${previous}, now ${obs.count}`,
          'CONFLICTING_OBSERVATION',
          { cell: target, previous, count: obs.count }
        );
      }
      this.record('reobserve', `${cellToString(target)} = ${obs.count}`, performance.now() - started);
      return emptyReport();
    }

    // Built before any state changes so a bad count leaves the base untouched
    const sentence = this.reduce(neighbors(target, this.dimensions), obs.count);

    this.visited.add(target);
    this.observed.set(cellKey(target), obs.count);
    this.applySafe(target);
    this.insert(sentence);

    const report = this.fixpoint();
    this.record(
      'observe',
      `${cellToString(target)} = ${obs.count}: ${report.passes} passes, ` +
        `+${report.minesFound.length} mines, +${report.safesFound.length} safes`,
      performance.now() - started
    );
    return report;
  }

  /**
   * Add a constraint that does not come from a revealed cell, such as a
   * mine total for a region, then propagate.
   */
  addSentence(cells: Iterable<Cell>, count: number): PropagationReport {
    const list = Array.from(cells, c => parseWith(CellSchema, c, 'INVALID_OBSERVATION'));
    for (const c of list) {
      if (!isInBounds(c, this.dimensions)) {
        throw new SweepError(`${cellToString(c)} lies off the board`, 'INVALID_OBSERVATION', { cell: c });
      }
    }
    return this.atomically(() => {
      this.insert(this.reduce(list, count));
      return this.fixpoint();
    });
  }

  /**
   * Apply direct knowledge and subset resolution until a pass changes
   * nothing. On a contradiction the knowledge base is restored.
   */
  propagate(): PropagationReport {
    return this.atomically(() => this.fixpoint());
  }

  private fixpoint(): PropagationReport {
    const report = emptyReport();
    let changed = true;

    while (changed) {
      const started = performance.now();
      changed = false;
      report.passes++;

      // Disclose
      const newMines = new CellSet();
      const newSafes = new CellSet();
      for (const sentence of this.knowledge) {
        for (const c of sentence.knownMines()) {
          if (!this.provenMines.has(c)) newMines.add(c);
        }
        for (const c of sentence.knownSafes()) {
          if (!this.provenSafes.has(c)) newSafes.add(c);
        }
      }

      const clash = newMines.intersection(newSafes);
      if (clash.size > 0) {
        throw new SweepError(`Cells ${clash.toString()} are both mined and safe`, 'CONTRADICTION', {
          cells: clash.toArray(),
        });
      }

      // Mark: each kind of fact under its own guard
      if (newSafes.size > 0) {
        changed = true;
        for (const c of newSafes) {
          this.applySafe(c);
          report.safesFound.push(c);
        }
      }
      if (newMines.size > 0) {
        changed = true;
        for (const c of newMines) {
          this.applyMine(c);
          report.minesFound.push(c);
        }
      }

      // Retire
      const next: Sentence[] = [];
      const live = new Set<string>();
      let retired = 0;
      for (const sentence of this.knowledge) {
        if (sentence.count < 0 || sentence.count > sentence.size) {
          throw new SweepError(`Known cells leave ${sentence.toString()} unsatisfiable`, 'CONTRADICTION', {
            sentence: sentence.toString(),
          });
        }
        const key = sentence.key();
        if (sentence.isEmpty() || live.has(key)) {
          retired++;
          continue;
        }
        live.add(key);
        next.push(sentence);
      }

      // Resolve
      const derived: Sentence[] = [];
      for (const subset of next) {
        for (const superset of next) {
          if (subset === superset || !subset.isStrictSubsetOf(superset)) continue;
          this.assertResolvable(subset, superset);
          const candidate = superset.subtract(subset);
          const key = candidate.key();
          if (live.has(key)) continue;
          live.add(key);
          derived.push(candidate);
        }
      }

      this.knowledge = [...next, ...derived];
      if (retired > 0 || derived.length > 0) changed = true;
      report.retired += retired;
      report.derived += derived.length;

      if (this.config.checkInvariants) this.assertInvariants();
      this.record(
        'pass',
        `pass ${report.passes}: +${newMines.size} mines, +${newSafes.size} safes, ` +
          `-${retired} retired, +${derived.length} derived, ${this.knowledge.length} live`,
        performance.now() - started
      );
    }

    return report;
  }

  // ---------------------------------------------------------------------------
  // Invariants
  // ---------------------------------------------------------------------------

  assertInvariants(): void {
    const overlap = this.provenMines.intersection(this.provenSafes);
    if (overlap.size > 0) {
      throw new SweepError(`Cells ${overlap.toString()} are both mines and safes`, 'INVARIANT_VIOLATION', {
        cells: overlap.toArray(),
      });
    }
    for (const sentence of this.knowledge) {
      sentence.assertValid();
      for (const c of sentence.cells) {
        if (this.provenMines.has(c) || this.provenSafes.has(c)) {
          throw new SweepError(
            `Sentence ${sentence.toString()} still mentions known cell ${cellToString(c)}`,
            'INVARIANT_VIOLATION',
            { cell: c }
          );
        }
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /** Runs a mutation, restoring every piece of state if it throws */
  private atomically<T>(mutate: () => T): T {
    const saved = {
      visited: this.visited.clone(),
      provenMines: this.provenMines.clone(),
      provenSafes: this.provenSafes.clone(),
      knowledge: this.knowledge.map(s => s.clone()),
      observed: new Map(this.observed),
      traceLog: this.traceLog,
    };
    try {
      return mutate();
    } catch (err) {
      this.visited = saved.visited;
      this.provenMines = saved.provenMines;
      this.provenSafes = saved.provenSafes;
      this.knowledge = saved.knowledge;
      this.observed = saved.observed;
      this.traceLog = saved.traceLog;
      throw err;
    }
  }

  private parseFact(c: Cell, kind: 'mine' | 'safe'): Cell {
    const parsed = parseWith(CellSchema, c, 'INVALID_OBSERVATION');
    const target: Cell = { row: parsed.row, col: parsed.col };
    if (!isInBounds(target, this.dimensions)) {
      throw new SweepError(`${cellToString(target)} lies off the board`, 'INVALID_OBSERVATION', { cell: target });
    }
    const opposite = kind === 'mine' ? this.provenSafes : this.provenMines;
    if (opposite.has(target)) {
      throw new SweepError(
        `${cellToString(target)} is already proven ${kind === 'mine' ? 'safe' : 'a mine'}`,
        'CONTRADICTION',
        { cell: target }
      );
    }
    return target;
  }

  private applyMine(c: Cell): void {
    this.provenMines.add(c);
    for (const sentence of this.knowledge) {
      sentence.markMine(c);
    }
  }

  private applySafe(c: Cell): void {
    this.provenSafes.add(c);
    for (const sentence of this.knowledge) {
      sentence.markSafe(c);
    }
  }

  /** Drops known cells, charging known mines against the count */
  private reduce(cells: Iterable<Cell>, count: number): Sentence {
    const unknown = new CellSet();
    let remaining = count;
    for (const c of new CellSet(cells)) {
      if (this.provenMines.has(c)) {
        remaining--;
      } else if (!this.provenSafes.has(c) && !this.visited.has(c)) {
        unknown.add(c);
      }
    }
    return new Sentence(unknown, remaining);
  }

  private insert(sentence: Sentence): void {
    if (!this.knowledge.some(s => s.equals(sentence))) {
      this.knowledge.push(sentence);
    }
  }

  private assertResolvable(subset: Sentence, superset: Sentence): void {
    const remainder = superset.count - subset.count;
    if (remainder < 0 || remainder > superset.size - subset.size) {
      throw new SweepError(
        `${subset.toString()} and ${superset.toString()} cannot both hold`,
        'CONTRADICTION',
        { subset: subset.toString(), superset: superset.toString() }
      );
    }
  }

  private record(stage: TraceStage, summary: string, durationMs: number): void {
    if (!this.config.trace) return;
    this.traceLog = addTrace(this.traceLog, stage, summary, durationMs);
  }
}
