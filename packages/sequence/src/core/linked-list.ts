/**
 * Read-only view of an element's position in a {@link LinkedList}.
 */
export interface ListNode<T> {
  readonly value: T
  readonly next: ListNode<T> | undefined
  readonly prev: ListNode<T> | undefined
}

class Link<T> implements ListNode<T> {
  next: Link<T> | undefined = undefined
  prev: Link<T> | undefined = undefined

  constructor(
    readonly value: T,
    public owner: LinkedList<T> | undefined,
  ) {}
}

/**
 * Doubly-linked ordered list.
 *
 * Nodes handed out by the list stay valid until they are removed; passing a
 * node of another list (or a removed one) to a positional method is a no-op.
 */
export class LinkedList<T> implements Iterable<T> {
  private head: Link<T> | undefined = undefined
  private tail: Link<T> | undefined = undefined
  private count = 0

  get length(): number {
    return this.count
  }

  front(): ListNode<T> | undefined {
    return this.head
  }

  back(): ListNode<T> | undefined {
    return this.tail
  }

  pushBack(value: T): ListNode<T> {
    return this.attach(new Link(value, this), this.tail, undefined)
  }

  pushFront(value: T): ListNode<T> {
    return this.attach(new Link(value, this), undefined, this.head)
  }

  /** Inserts before `mark`. Returns undefined when `mark` is not in this list. */
  insertBefore(value: T, mark: ListNode<T>): ListNode<T> | undefined {
    const at = this.own(mark)
    if (!at) return undefined

    return this.attach(new Link(value, this), at.prev, at)
  }

  /** Inserts after `mark`. Returns undefined when `mark` is not in this list. */
  insertAfter(value: T, mark: ListNode<T>): ListNode<T> | undefined {
    const at = this.own(mark)
    if (!at) return undefined

    return this.attach(new Link(value, this), at, at.next)
  }

  /** Returns true if `node` was in this list. */
  remove(node: ListNode<T>): boolean {
    const link = this.own(node)
    if (!link) return false

    if (link.prev) link.prev.next = link.next
    else this.head = link.next

    if (link.next) link.next.prev = link.prev
    else this.tail = link.prev

    link.prev = undefined
    link.next = undefined
    link.owner = undefined
    this.count--

    return true
  }

  clear(): void {
    for (let link = this.head; link; link = link.next) {
      link.owner = undefined
    }

    this.head = undefined
    this.tail = undefined
    this.count = 0
  }

  toArray(): T[] {
    const result = new Array<T>(this.count)

    let i = 0
    for (let link = this.head; link; link = link.next) {
      result[i++] = link.value
    }

    return result
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let link = this.head; link; link = link.next) {
      yield link.value
    }
  }

  private own(node: ListNode<T>): Link<T> | undefined {
    return node instanceof Link && node.owner === this ? node : undefined
  }

  private attach(link: Link<T>, prev: Link<T> | undefined, next: Link<T> | undefined): Link<T> {
    link.prev = prev
    link.next = next

    if (prev) prev.next = link
    else this.head = link

    if (next) next.prev = link
    else this.tail = link

    this.count++

    return link
  }
}
