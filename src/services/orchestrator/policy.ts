// Tool policy
// Decides which registered tools are offered to the model for a query

const COMPARISON_INTENT = /\b(compare[sd]?|comparing|comparison|vs\.?|versus|benchmarks?|outperforms?|better than|faster than|difference between)\b/i;
const VISUAL_INTENT = /\b(charts?|plots?|graphs?|visuali[sz]e|visuali[sz]ation)\b/i;

const COMPARISON_TOOLS = new Set(['extract_performance_metrics', 'create_performance_comparison']);
const CHART_TOOLS = new Set(['create_performance_chart']);

export function hasComparisonIntent(query: string): boolean {
  return COMPARISON_INTENT.test(query);
}

export function hasVisualIntent(query: string): boolean {
  return VISUAL_INTENT.test(query);
}

/**
 * Names of the tools to advertise for this query, in the order given.
 * Search and report tools, and any tool not listed above, are always offered.
 */
export function selectToolNames(query: string, available: readonly string[]): string[] {
  const comparison = hasComparisonIntent(query);
  const visual = hasVisualIntent(query);

  return available.filter(name => {
    if (COMPARISON_TOOLS.has(name)) return comparison;
    if (CHART_TOOLS.has(name)) return comparison || visual;
    return true;
  });
}
