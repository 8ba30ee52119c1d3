/** Rough token estimate: ~4 characters per token for English text. */
export function estimateTokens(text: string) {
  return Math.ceil(text.length / 4)
}

/**
 * Pick as many recent messages as will fit within a rough token budget.
 *
 * Walks newest -> oldest and stops at the first message that would overflow,
 * so the kept window is always a contiguous tail of the conversation.
 */
export function takeRecentWithinTokenBudget<T extends { content: string }>(args: {
  maxTokens: number
  newestToOldest: readonly T[]
}) {
  const selected: T[] = []
  let used = 0

  for (const m of args.newestToOldest) {
    const tokens = estimateTokens(m.content)
    if (used + tokens > args.maxTokens) break
    selected.push(m)
    used += tokens
  }

  return { selectedNewestToOldest: selected, usedTokens: used }
}
