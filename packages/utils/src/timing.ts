export function elapsedMilliseconds(startTime: Date | number): number {
  return Date.now() - new Date(startTime).getTime();
}

export function formatDuration(milliseconds: number): string {
  return `${(milliseconds / 1000).toFixed(2)}s`;
}
