import { FORMATS, type Format } from './formats.js';

export type FormatPair = { from: Format; to: Format };

export type ConversionPath = {
  from: Format;
  to: Format;
  hops: FormatPair[];
};

/**
 * Pivot preference used to break ties between equally short paths.
 * html and markdown carry the most structure, so they are tried first.
 */
export const PIVOT_PRIORITY: readonly Format[] = ['html', 'markdown', 'text', 'pdf', 'docx'];

export const DEFAULT_EDGES: readonly FormatPair[] = [
  { from: 'text', to: 'markdown' },
  { from: 'text', to: 'html' },
  { from: 'markdown', to: 'html' },
  { from: 'markdown', to: 'text' },
  { from: 'html', to: 'markdown' },
  { from: 'html', to: 'text' },
  { from: 'html', to: 'pdf' },
  { from: 'pdf', to: 'text' },
  { from: 'docx', to: 'html' },
  { from: 'docx', to: 'text' },
];

/**
 * Format Graph - which formats convert directly into which, and the shortest
 * multi-hop route when there is no direct converter.
 *
 * The graph is static after construction and small enough that every query is
 * a plain breadth-first search.
 */
export class FormatGraph {
  private readonly adjacency = new Map<Format, Format[]>();
  private readonly rank = new Map<Format, number>();

  constructor(edges: readonly FormatPair[] = DEFAULT_EDGES, priority: readonly Format[] = PIVOT_PRIORITY) {
    FORMATS.forEach((f) => this.adjacency.set(f, []));
    priority.forEach((f, i) => {
      if (!this.rank.has(f)) this.rank.set(f, i);
    });
    for (const { from, to } of edges) {
      if (from === to) continue;
      const next = this.adjacency.get(from) ?? [];
      if (!next.includes(to)) next.push(to);
      this.adjacency.set(from, next);
    }
    for (const list of this.adjacency.values()) {
      list.sort((a, b) => this.rankOf(a) - this.rankOf(b));
    }
  }

  formats(): Format[] {
    return [...FORMATS];
  }

  hasEdge(from: Format, to: Format): boolean {
    return this.adjacency.get(from)?.includes(to) ?? false;
  }

  edges(): FormatPair[] {
    const out: FormatPair[] = [];
    for (const from of FORMATS) {
      for (const to of this.adjacency.get(from) ?? []) out.push({ from, to });
    }
    return out;
  }

  /**
   * Shortest path from `from` to `to`, or null when the formats are not connected.
   * Identical formats resolve to a zero-hop path.
   */
  resolve(from: Format, to: Format): ConversionPath | null {
    if (from === to) return { from, to, hops: [] };

    const parent = new Map<Format, Format>();
    const visited = new Set<Format>([from]);
    const queue: Format[] = [from];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const next of this.adjacency.get(current) ?? []) {
        if (visited.has(next)) continue;
        visited.add(next);
        parent.set(next, current);
        if (next === to) return { from, to, hops: this.unwind(parent, from, to) };
        queue.push(next);
      }
    }
    return null;
  }

  private unwind(parent: Map<Format, Format>, from: Format, to: Format): FormatPair[] {
    const hops: FormatPair[] = [];
    let node = to;
    while (node !== from) {
      const prev = parent.get(node);
      if (prev === undefined) break;
      hops.unshift({ from: prev, to: node });
      node = prev;
    }
    return hops;
  }

  private rankOf(format: Format): number {
    return this.rank.get(format) ?? Number.MAX_SAFE_INTEGER;
  }
}
