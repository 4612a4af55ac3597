function bigrams(text: string): Map<string, number> {
  const chars = Array.from(text.replace(/\s+/g, ""));
  const grams = new Map<string, number>();
  if (chars.length === 1) {
    grams.set(chars[0] ?? "", 1);
    return grams;
  }
  for (let index = 0; index + 1 < chars.length; index += 1) {
    const gram = `${chars[index]}${chars[index + 1]}`;
    grams.set(gram, (grams.get(gram) ?? 0) + 1);
  }
  return grams;
}

// Dice coefficient over character bigram multisets, in [0, 1].
export function diceSimilarity(left: string, right: string): number {
  const a = bigrams(left);
  const b = bigrams(right);
  let sizeA = 0;
  let sizeB = 0;
  for (const count of a.values()) {
    sizeA += count;
  }
  for (const count of b.values()) {
    sizeB += count;
  }
  if (sizeA === 0 || sizeB === 0) {
    return 0;
  }
  let overlap = 0;
  for (const [gram, count] of a) {
    overlap += Math.min(count, b.get(gram) ?? 0);
  }
  return (2 * overlap) / (sizeA + sizeB);
}
