/**
 * Keyword Matcher
 *
 * Aho-Corasick automaton over a lowercase keyword set. `matches` scans the
 * text once; the work per character does not depend on how many keywords
 * were loaded. Build once per run and share it read-only.
 */

export interface KeywordMatcher {
  /** Number of distinct keywords in the automaton */
  readonly size: number
  /** True iff the lowercased text contains at least one keyword */
  matches(text: string): boolean
}

interface AutomatonNode {
  next: Map<string, number>
  fail: number
  /** A keyword ends here or at one of the nodes on the fail chain */
  terminal: boolean
}

const ROOT = 0

/**
 * Lowercase, trim and deduplicate a keyword list, keeping first-seen order.
 * Blank entries are dropped.
 */
export function normalizeKeywords(keywords: Iterable<string>): string[] {
  const seen = new Set<string>()
  for (const raw of keywords) {
    const keyword = raw.trim().toLowerCase()
    if (keyword) {
      seen.add(keyword)
    }
  }
  return [...seen]
}

class AhoCorasickMatcher implements KeywordMatcher {
  readonly size: number
  private readonly nodes: AutomatonNode[] = [{ next: new Map(), fail: ROOT, terminal: false }]

  constructor(keywords: readonly string[]) {
    this.size = keywords.length
    for (const keyword of keywords) {
      this.insert(keyword)
    }
    this.link()
  }

  matches(text: string): boolean {
    if (this.size === 0) {
      return true
    }

    let state = ROOT
    for (const char of text.toLowerCase()) {
      state = this.step(state, char)
      if (this.nodes[state].terminal) {
        return true
      }
    }
    return false
  }

  private insert(keyword: string): void {
    let state = ROOT
    for (const char of keyword) {
      const existing = this.nodes[state].next.get(char)
      if (existing !== undefined) {
        state = existing
        continue
      }
      const created = this.nodes.length
      this.nodes.push({ next: new Map(), fail: ROOT, terminal: false })
      this.nodes[state].next.set(char, created)
      state = created
    }
    this.nodes[state].terminal = true
  }

  /**
   * Breadth-first construction of fail links. A node is terminal when its
   * fail target is, so a single flag check per character finds keywords that
   * end inside a longer partial match.
   */
  private link(): void {
    const queue: number[] = []
    for (const child of this.nodes[ROOT].next.values()) {
      this.nodes[child].fail = ROOT
      queue.push(child)
    }

    for (let head = 0; head < queue.length; head++) {
      const state = queue[head]
      for (const [char, child] of this.nodes[state].next) {
        const fail = this.step(this.nodes[state].fail, char)
        this.nodes[child].fail = fail
        this.nodes[child].terminal = this.nodes[child].terminal || this.nodes[fail].terminal
        queue.push(child)
      }
    }
  }

  private step(state: number, char: string): number {
    let current = state
    while (true) {
      const next = this.nodes[current].next.get(char)
      if (next !== undefined) {
        return next
      }
      if (current === ROOT) {
        return ROOT
      }
      current = this.nodes[current].fail
    }
  }
}

/**
 * Build a matcher from a keyword list. An empty list yields a matcher that
 * accepts every text.
 */
export function buildKeywordMatcher(keywords: Iterable<string>): KeywordMatcher {
  return new AhoCorasickMatcher(normalizeKeywords(keywords))
}
