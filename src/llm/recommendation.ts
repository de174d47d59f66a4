export type Recommendation = 'BUY' | 'SELL' | 'HOLD' | 'INDETERMINATE' | 'UNKNOWN' | 'N/A';

const KEYWORDS = ['BUY', 'SELL', 'HOLD'] as const;

function countOccurrences(text: string, keyword: string): number {
  return text.split(keyword).length - 1;
}

/**
 * Picks the keyword mentioned most often (case-sensitive). No mention gives
 * INDETERMINATE, a tie for the top count gives UNKNOWN.
 */
export function extractRecommendation(analysisText: string): Recommendation {
  if (!analysisText) return 'N/A';

  const counts = KEYWORDS.map((keyword) => ({
    keyword,
    count: countOccurrences(analysisText, keyword),
  }));
  const max = Math.max(...counts.map((c) => c.count));
  if (max === 0) return 'INDETERMINATE';

  const leaders = counts.filter((c) => c.count === max);
  return leaders.length === 1 ? leaders[0].keyword : 'UNKNOWN';
}
