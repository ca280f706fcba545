import { NO_DEADLINE, type Deadline } from '../concurrency.js';
import type { FileRecord } from '../../types/context.js';
import { FileIndex } from './file-index.js';
import { ImportRuleRegistry } from './import-rules.js';

/** Only the head of a file is searched for imports */
export const MAX_IMPORT_SCAN_CHARS = 32 * 1024;

/**
 * Directed import graph between scanned files. Both ends of every edge are
 * known paths; self-edges are never stored.
 */
export class DependencyGraph {
  private readonly forward = new Map<string, Set<string>>();
  private readonly reverse = new Map<string, Set<string>>();

  addEdge(from: string, to: string): boolean {
    if (from === to) {
      return false;
    }
    const targets = this.forward.get(from) ?? new Set<string>();
    if (targets.has(to)) {
      return false;
    }
    targets.add(to);
    this.forward.set(from, targets);

    const sources = this.reverse.get(to) ?? new Set<string>();
    sources.add(from);
    this.reverse.set(to, sources);
    return true;
  }

  /** Files `path` imports, in path order */
  dependenciesOf(path: string): string[] {
    return sorted(this.forward.get(path));
  }

  /** Files that import `path`, in path order */
  dependentsOf(path: string): string[] {
    return sorted(this.reverse.get(path));
  }

  /** Union of both directions, in path order */
  neighbors(path: string): string[] {
    const all = new Set([...(this.forward.get(path) ?? []), ...(this.reverse.get(path) ?? [])]);
    return sorted(all);
  }

  get edgeCount(): number {
    let count = 0;
    for (const targets of this.forward.values()) {
      count += targets.size;
    }
    return count;
  }

  toJSON(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const from of sorted(new Set(this.forward.keys()))) {
      out[from] = this.dependenciesOf(from);
    }
    return out;
  }
}

function sorted(paths: ReadonlySet<string> | undefined): string[] {
  return paths ? Array.from(paths).sort() : [];
}

export interface DependencyGraphOptions {
  registry?: ImportRuleRegistry;
  deadline?: Deadline;
}

export interface DependencyGraphResult {
  graph: DependencyGraph;
  /** The deadline expired before every file was examined */
  partial: boolean;
}

/**
 * Build the import graph for records whose content has been loaded.
 * Records without content or without a rule for their language add no edges.
 */
export function buildDependencyGraph(
  records: readonly FileRecord[],
  options: DependencyGraphOptions = {}
): DependencyGraphResult {
  const registry = options.registry ?? new ImportRuleRegistry();
  const deadline = options.deadline ?? NO_DEADLINE;
  const files = new FileIndex(records.map(r => r.path));
  const graph = new DependencyGraph();

  for (const record of records) {
    if (deadline.expired()) {
      return { graph, partial: true };
    }
    const rule = registry.ruleFor(record.language);
    if (!rule || record.content === undefined) {
      continue;
    }

    const head = record.content.slice(0, MAX_IMPORT_SCAN_CHARS);
    for (const reference of rule.extract(head)) {
      for (const target of rule.resolve(reference, { fromPath: record.path, files })) {
        graph.addEdge(record.path, target);
      }
    }
  }

  return { graph, partial: false };
}
