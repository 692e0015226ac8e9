/**
 * Search tree node and frontier shared by every algorithm
 */

import { Position } from '../domain/types.js';

export interface SearchNode {
  readonly position: Position;
  readonly parent: SearchNode | null;
  readonly g: number; // cost from start
  readonly h: number; // estimated cost to goal
  readonly f: number; // g + h
  readonly time: number;
}

/**
 * Create a search node
 */
export function createSearchNode(
  position: Position,
  parent: SearchNode | null,
  g: number,
  h: number,
  time: number
): SearchNode {
  return {
    position,
    parent,
    g,
    h,
    f: g + h,
    time,
  };
}

/**
 * Walk parent links from a node back to the root and return the positions root-first
 */
export function reconstructPath(node: SearchNode): Position[] {
  const path: Position[] = [];
  let current: SearchNode | null = node;

  while (current !== null) {
    path.push(current.position);
    current = current.parent;
  }

  return path.reverse();
}

interface QueueEntry<T> {
  item: T;
  priority: number;
  sequence: number;
}

/**
 * Binary min-heap. Equal priorities leave in insertion order.
 */
export class PriorityQueue<T> {
  private items: QueueEntry<T>[] = [];
  private counter = 0;

  push(item: T, priority: number): void {
    this.items.push({ item, priority, sequence: this.counter++ });
    this.bubbleUp(this.items.length - 1);
  }

  pop(): T | undefined {
    if (this.items.length === 0) return undefined;

    const result = this.items[0];
    const last = this.items.pop();

    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.bubbleDown(0);
    }

    return result.item;
  }

  peek(): T | undefined {
    return this.items[0]?.item;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  size(): number {
    return this.items.length;
  }

  private before(a: QueueEntry<T>, b: QueueEntry<T>): boolean {
    if (a.priority !== b.priority) return a.priority < b.priority;
    return a.sequence < b.sequence;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (!this.before(this.items[index], this.items[parentIndex])) {
        break;
      }
      [this.items[parentIndex], this.items[index]] = [this.items[index], this.items[parentIndex]];
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    while (true) {
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;
      let smallest = index;

      if (leftChild < this.items.length && this.before(this.items[leftChild], this.items[smallest])) {
        smallest = leftChild;
      }

      if (rightChild < this.items.length && this.before(this.items[rightChild], this.items[smallest])) {
        smallest = rightChild;
      }

      if (smallest === index) break;

      [this.items[smallest], this.items[index]] = [this.items[index], this.items[smallest]];
      index = smallest;
    }
  }
}
