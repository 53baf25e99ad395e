export function generateRefreshId(): string {
  return `refresh_${Date.now()}_${Math.random().toString(36).substring(2, 8)}`;
}
