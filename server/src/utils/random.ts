export function pickRandom<T>(items: readonly T[], random: () => number): T | undefined {
  if (items.length === 0) return undefined;
  const i = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[i];
}
