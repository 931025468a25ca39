type RecencyNode<K> = {
  key: K
  prev: RecencyNode<K> | undefined
  next: RecencyNode<K> | undefined
}

/**
 * Read side of the recency index, as seen by eviction strategies.
 */
export interface RecencyView<K> {
  readonly size: number

  /** Most recently touched key. */
  front(): K | undefined

  /** Least recently touched key. */
  back(): K | undefined
}

/**
 * Keys ordered by last touch, most recent at the front.
 *
 * A doubly linked list plus a key to node map, so every mutation is O(1)
 * and a key appears at most once.
 */
export class RecencyIndex<K> implements RecencyView<K>, Iterable<K> {
  private readonly nodes = new Map<K, RecencyNode<K>>()
  private head: RecencyNode<K> | undefined
  private tail: RecencyNode<K> | undefined

  get size(): number {
    return this.nodes.size
  }

  has(key: K): boolean {
    return this.nodes.has(key)
  }

  /** Insert `key` at the front; a key already present is moved there instead. */
  pushFront(key: K): void {
    const existing = this.nodes.get(key)

    if (existing) {
      this.promote(existing)
      return
    }

    const node: RecencyNode<K> = { key, prev: undefined, next: this.head }

    if (this.head) this.head.prev = node
    this.head = node
    if (!this.tail) this.tail = node

    this.nodes.set(key, node)
  }

  /** Returns false if the key is not indexed. */
  moveToFront(key: K): boolean {
    const node = this.nodes.get(key)
    if (!node) return false

    this.promote(node)

    return true
  }

  remove(key: K): boolean {
    const node = this.nodes.get(key)
    if (!node) return false

    this.unlink(node)
    this.nodes.delete(key)

    return true
  }

  front(): K | undefined {
    return this.head?.key
  }

  back(): K | undefined {
    return this.tail?.key
  }

  clear(): void {
    this.nodes.clear()
    this.head = undefined
    this.tail = undefined
  }

  *[Symbol.iterator](): Iterator<K> {
    for (let node = this.head; node; node = node.next) {
      yield node.key
    }
  }

  private promote(node: RecencyNode<K>): void {
    if (node === this.head) return

    this.unlink(node)

    node.next = this.head
    if (this.head) this.head.prev = node
    this.head = node
    if (!this.tail) this.tail = node
  }

  private unlink(node: RecencyNode<K>): void {
    if (node.prev) node.prev.next = node.next
    else this.head = node.next

    if (node.next) node.next.prev = node.prev
    else this.tail = node.prev

    node.prev = undefined
    node.next = undefined
  }
}
