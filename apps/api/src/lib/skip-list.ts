/**
 * Indexable skip list ordered by score (descending), then member (ascending).
 *
 * Every forward pointer carries a span: the number of level-0 steps it
 * skips. Summing spans along a search path gives a node's 1-based rank, and
 * walking spans from the header finds the node at a given rank, so update,
 * rank-of and top-K are all logarithmic (plus K for the range walk).
 */

export const SKIP_LIST_MAX_LEVEL = 32;
export const SKIP_LIST_P = 0.25;

interface SkipListNode {
  member: string;
  score: number;
  forward: Array<SkipListNode | null>;
  span: number[];
}

export interface RankedMember {
  member: string;
  score: number;
}

function createNode(level: number, score: number, member: string): SkipListNode {
  return {
    member,
    score,
    forward: new Array<SkipListNode | null>(level).fill(null),
    span: new Array<number>(level).fill(0),
  };
}

/** True when `node` sorts strictly before (score, member) */
function sortsBefore(node: SkipListNode, score: number, member: string): boolean {
  return node.score > score || (node.score === score && node.member < member);
}

export class RankSkipList {
  private readonly header: SkipListNode;
  private readonly scores = new Map<string, number>();
  private level = 1;
  private length = 0;

  constructor(private readonly random: () => number = Math.random) {
    this.header = createNode(SKIP_LIST_MAX_LEVEL, Number.POSITIVE_INFINITY, '');
  }

  get size(): number {
    return this.length;
  }

  /**
   * Upsert with overwrite semantics. Returns true when the entry changed.
   */
  set(member: string, score: number): boolean {
    const current = this.scores.get(member);
    if (current === score) {
      return false;
    }
    if (current !== undefined) {
      this.delete(current, member);
    }
    this.insert(score, member);
    this.scores.set(member, score);
    return true;
  }

  remove(member: string): boolean {
    const current = this.scores.get(member);
    if (current === undefined) {
      return false;
    }
    this.delete(current, member);
    this.scores.delete(member);
    return true;
  }

  score(member: string): number | null {
    return this.scores.get(member) ?? null;
  }

  /**
   * 1-based rank, or null when the member is absent
   */
  rank(member: string): number | null {
    const score = this.scores.get(member);
    if (score === undefined) {
      return null;
    }

    let rank = 0;
    let x = this.header;
    for (let i = this.level - 1; i >= 0; i--) {
      let next = x.forward[i];
      while (next && (sortsBefore(next, score, member) || next.member === member)) {
        rank += x.span[i];
        x = next;
        next = x.forward[i];
      }
      if (x !== this.header && x.member === member) {
        return rank;
      }
    }
    return null;
  }

  /**
   * Up to `count` entries starting at 0-based position `offset`
   */
  range(offset: number, count: number): RankedMember[] {
    const result: RankedMember[] = [];
    if (count <= 0 || offset < 0 || offset >= this.length) {
      return result;
    }

    let node = this.nodeAtRank(offset + 1);
    while (node && result.length < count) {
      result.push({ member: node.member, score: node.score });
      node = node.forward[0];
    }
    return result;
  }

  private randomLevel(): number {
    let level = 1;
    while (this.random() < SKIP_LIST_P && level < SKIP_LIST_MAX_LEVEL) {
      level++;
    }
    return level;
  }

  private insert(score: number, member: string): void {
    const update = new Array<SkipListNode>(SKIP_LIST_MAX_LEVEL);
    const rank = new Array<number>(SKIP_LIST_MAX_LEVEL).fill(0);

    let x = this.header;
    for (let i = this.level - 1; i >= 0; i--) {
      rank[i] = i === this.level - 1 ? 0 : rank[i + 1];
      let next = x.forward[i];
      while (next && sortsBefore(next, score, member)) {
        rank[i] += x.span[i];
        x = next;
        next = x.forward[i];
      }
      update[i] = x;
    }

    const level = this.randomLevel();
    if (level > this.level) {
      for (let i = this.level; i < level; i++) {
        rank[i] = 0;
        update[i] = this.header;
        this.header.span[i] = this.length;
      }
      this.level = level;
    }

    const node = createNode(level, score, member);
    for (let i = 0; i < level; i++) {
      node.forward[i] = update[i].forward[i];
      update[i].forward[i] = node;

      node.span[i] = update[i].span[i] - (rank[0] - rank[i]);
      update[i].span[i] = rank[0] - rank[i] + 1;
    }

    // Untouched higher levels now skip one more node
    for (let i = level; i < this.level; i++) {
      update[i].span[i]++;
    }

    this.length++;
  }

  private delete(score: number, member: string): void {
    const update = new Array<SkipListNode>(SKIP_LIST_MAX_LEVEL);

    let x = this.header;
    for (let i = this.level - 1; i >= 0; i--) {
      let next = x.forward[i];
      while (next && sortsBefore(next, score, member)) {
        x = next;
        next = x.forward[i];
      }
      update[i] = x;
    }

    const target = x.forward[0];
    if (!target || target.score !== score || target.member !== member) {
      return;
    }

    for (let i = 0; i < this.level; i++) {
      if (update[i].forward[i] === target) {
        update[i].span[i] += target.span[i] - 1;
        update[i].forward[i] = target.forward[i];
      } else {
        update[i].span[i] -= 1;
      }
    }

    while (this.level > 1 && this.header.forward[this.level - 1] === null) {
      this.level--;
    }
    this.length--;
  }

  private nodeAtRank(rank: number): SkipListNode | null {
    let traversed = 0;
    let x = this.header;
    for (let i = this.level - 1; i >= 0; i--) {
      let next = x.forward[i];
      while (next && traversed + x.span[i] <= rank) {
        traversed += x.span[i];
        x = next;
        next = x.forward[i];
      }
      if (traversed === rank) {
        return x;
      }
    }
    return null;
  }
}
