import { describe, expect, it } from 'vitest';
import { FormatGraph } from '../core/FormatGraph.js';

describe('FormatGraph', () => {
  const graph = new FormatGraph();

  it('resolves identical formats to a zero-hop path', () => {
    expect(graph.resolve('pdf', 'pdf')).toEqual({ from: 'pdf', to: 'pdf', hops: [] });
  });

  it('uses the direct edge when one exists', () => {
    expect(graph.resolve('markdown', 'html')?.hops).toEqual([{ from: 'markdown', to: 'html' }]);
  });

  it('routes docx to markdown through html', () => {
    expect(graph.resolve('docx', 'markdown')?.hops).toEqual([
      { from: 'docx', to: 'html' },
      { from: 'html', to: 'markdown' },
    ]);
  });

  it('routes pdf to html through text', () => {
    expect(graph.resolve('pdf', 'html')?.hops).toEqual([
      { from: 'pdf', to: 'text' },
      { from: 'text', to: 'html' },
    ]);
  });

  it('routes text to pdf through html', () => {
    expect(graph.resolve('text', 'pdf')?.hops).toEqual([
      { from: 'text', to: 'html' },
      { from: 'html', to: 'pdf' },
    ]);
  });

  it('returns null when no path exists', () => {
    expect(graph.resolve('text', 'docx')).toBeNull();
    expect(graph.resolve('pdf', 'docx')).toBeNull();
  });

  it('breaks ties between equal-length paths by pivot priority', () => {
    const edges = [
      { from: 'text', to: 'markdown' },
      { from: 'text', to: 'html' },
      { from: 'markdown', to: 'pdf' },
      { from: 'html', to: 'pdf' },
    ] as const;

    expect(new FormatGraph(edges).resolve('text', 'pdf')?.hops[0]).toEqual({ from: 'text', to: 'html' });
    expect(
      new FormatGraph(edges, ['markdown', 'html', 'text', 'pdf', 'docx']).resolve('text', 'pdf')?.hops[0]
    ).toEqual({ from: 'text', to: 'markdown' });
  });

  it('lists edges grouped by source in format order', () => {
    const edges = graph.edges();
    expect(edges).toHaveLength(10);
    expect(edges.slice(0, 2)).toEqual([
      { from: 'text', to: 'html' },
      { from: 'text', to: 'markdown' },
    ]);
    expect(graph.hasEdge('docx', 'html')).toBe(true);
    expect(graph.hasEdge('text', 'docx')).toBe(false);
  });

  it('lists every format in declaration order', () => {
    expect(graph.formats()).toEqual(['text', 'markdown', 'html', 'pdf', 'docx']);
  });
});
