export enum TrieResult {
  FAILED = "FAILED",
  PREFIX = "PREFIX",
  EXISTS = "EXISTS",
}

/**
 * Prefix tree over string keys. A node that ends a key carries that key's
 * value; every other node is a pure prefix.
 */
export interface Trie<V> {
  readonly children: Map<string, Trie<V>>
  value?: V
}

export interface TrieMatch<V> {
  value: V
  end: number
}

export function newTrie<V>(
  entries: Iterable<readonly [string, V]>,
  trie: Trie<V> = { children: new Map() },
): Trie<V> {
  for (const [key, value] of entries) {
    let current = trie
    for (const char of key) {
      let next = current.children.get(char)
      if (!next) {
        next = { children: new Map() }
        current.children.set(char, next)
      }
      current = next
    }
    current.value = value
  }
  return trie
}

export function inTrie<V>(trie: Trie<V>, key: string): [TrieResult, Trie<V>] {
  if (!key) {
    return [TrieResult.FAILED, trie]
  }

  let current = trie
  for (const char of key) {
    const next = current.children.get(char)
    if (!next) {
      return [TrieResult.FAILED, current]
    }
    current = next
  }

  if (current.value !== undefined) {
    return [TrieResult.EXISTS, current]
  }

  return [TrieResult.PREFIX, current]
}

/**
 * Walks `text` from `start` and returns the longest key found there, or
 * undefined when no key starts at that position.
 */
export function longestMatch<V>(
  trie: Trie<V>,
  text: string,
  start: number,
): TrieMatch<V> | undefined {
  let current = trie
  let best: TrieMatch<V> | undefined

  let i = start
  while (i < text.length) {
    // Keys are stored by code point, so surrogate pairs are read whole
    const codePoint = text.codePointAt(i)
    if (codePoint === undefined) break
    const char = String.fromCodePoint(codePoint)
    const [result, next] = inTrie(current, char)
    if (result === TrieResult.FAILED) break

    current = next
    i += char.length
    if (result === TrieResult.EXISTS && next.value !== undefined) {
      best = { value: next.value, end: i }
    }
  }

  return best
}
