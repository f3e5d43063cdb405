export function extractSeniority(title: string): string | undefined {
  const lowerTitle = title.toLowerCase();
  if (lowerTitle.includes('senior')) return 'senior';
  if (lowerTitle.includes('junior')) return 'junior';
  if (lowerTitle.includes('mid') || lowerTitle.includes('middle')) return 'mid';
  return undefined;
}
