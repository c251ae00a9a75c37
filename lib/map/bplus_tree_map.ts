/**
 * Copyright 2018 The Lovefield Project Authors. All Rights Reserved.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import {ErrorCode} from '../base/enum';
import {Exception} from '../base/exception';
import {Global} from '../base/global';
import {LogWriter} from '../base/log_writer';
import {CompareFn, Comparator} from '../index/comparator';
import {toComparator} from '../index/function_comparator';
import {ComparatorSet} from '../structs/comparator_set';
import {BPlusTree} from '../tree/bplus_tree';
import {BPlusTreeNode} from '../tree/bplus_tree_node';
import {LeafChain} from '../tree/leaf_chain';
import {MapEntry} from './map_entry';

/**
 * An ordered map backed by a B+ tree, sorted by the comparator given at
 * construction time.
 *
 * containsKey(), get() and put() cost O(log n): one node visit per tree level.
 * Full traversal follows the leaf chain.
 *
 * The map is not synchronized. Concurrent users must serialize put() and
 * clear() externally, or hand each reader its own instance.
 *
 * Removal is not supported, nor are putAll() and containsValue(); they throw
 * NOT_SUPPORTED.
 */
// @export
export class BPlusTreeMap<K, V> implements Iterable<[K, V]> {
  // The order m is the number of children an internal node may have; a node
  // holds at most m - 1 keys.
  static DEFAULT_ORDER = 16;

  readonly order: number;
  private readonly comparatorObj: Comparator<K>;
  private readonly logWriter: LogWriter;
  private tree: BPlusTree<K, V>;
  private count: number;

  constructor(comparator: Comparator<K> | CompareFn<K>);
  constructor(order: number, comparator: Comparator<K> | CompareFn<K>);
  constructor(
    orderOrComparator: number | Comparator<K> | CompareFn<K>,
    maybeComparator?: Comparator<K> | CompareFn<K>
  ) {
    let order = BPlusTreeMap.DEFAULT_ORDER;
    let comparator = maybeComparator;
    if (typeof orderOrComparator === 'number') {
      order = orderOrComparator;
    } else {
      comparator = orderOrComparator;
    }

    BPlusTree.checkOrder(order);
    if (!isComparator(comparator)) {
      // 101: A comparator function or object is required.
      throw new Exception(ErrorCode.INVALID_COMPARATOR);
    }

    this.order = order;
    this.comparatorObj = toComparator(comparator);
    this.logWriter = new LogWriter();
    this.tree = this.createTree();
    this.count = 0;
  }

  // Number of key-value pairs.
  size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.tree.isEmpty();
  }

  // Number of tree levels, 0 when empty.
  height(): number {
    return this.tree.height();
  }

  comparator(): Comparator<K> {
    return this.comparatorObj;
  }

  containsKey(key: K): boolean {
    return this.find(key) !== null;
  }

  // Returns the value mapped to |key|. Throws KEY_NOT_FOUND if there is none,
  // which keeps an absent key apart from a stored undefined or null.
  get(key: K): V {
    const found = this.find(key);
    if (found === null) {
      // 200: Key {0} not found.
      throw new Exception(ErrorCode.KEY_NOT_FOUND, String(key));
    }
    return found.leaf.values[found.pos];
  }

  getOrDefault(key: K, defaultValue: V): V {
    const found = this.find(key);
    return found === null ? defaultValue : found.leaf.values[found.pos];
  }

  // Adds or overwrites a pair, returns |value|.
  put(key: K, value: V): V {
    if (this.tree.put(key, value)) {
      this.count++;
    }
    if (Global.get().getOptions().debugMode) {
      this.checkValid('put');
    }
    return value;
  }

  clear(): void {
    this.logWriter.log('Map cleared', {
      operation: 'clear',
      size: this.count,
    });
    this.tree = this.createTree();
    this.count = 0;
  }

  keySet(): ComparatorSet<K> {
    const c = this.comparatorObj;
    return new ComparatorSet<K>(Array.from(this.keys()), (lhs, rhs) =>
      c.compare(lhs, rhs)
    );
  }

  values(): V[] {
    return Array.from(LeafChain.values(this.tree.getRoot()));
  }

  entrySet(): ComparatorSet<MapEntry<K, V>> {
    const c = this.comparatorObj;
    const entries: Array<MapEntry<K, V>> = [];
    for (const [key, value] of this.entries()) {
      entries.push(new MapEntry(key, value));
    }
    return new ComparatorSet<MapEntry<K, V>>(entries, (lhs, rhs) =>
      c.compare(lhs.key, rhs.key)
    );
  }

  // Lazy, single-use traversal in ascending key order. The map must not be
  // modified until the iteration is done.
  entries(): IterableIterator<[K, V]> {
    return LeafChain.entries(this.tree.getRoot());
  }

  keys(): IterableIterator<K> {
    return LeafChain.keys(this.tree.getRoot());
  }

  forEach(fn: (value: V, key: K) => void): void {
    for (const [key, value] of this.entries()) {
      fn(value, key);
    }
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  containsValue(value: V): boolean {
    // 300: Operation {0} is not supported.
    throw new Exception(ErrorCode.NOT_SUPPORTED, 'containsValue');
  }

  remove(key: K): V {
    // 300: Operation {0} is not supported.
    throw new Exception(ErrorCode.NOT_SUPPORTED, 'remove');
  }

  putAll(entries: Iterable<[K, V]>): void {
    // 300: Operation {0} is not supported.
    throw new Exception(ErrorCode.NOT_SUPPORTED, 'putAll');
  }

  // Dumps the tree structure, see BPlusTree.toString().
  toString(): string {
    return this.tree.toString();
  }

  private createTree(): BPlusTree<K, V> {
    return new BPlusTree<K, V>(this.order, this.comparatorObj, this.logWriter);
  }

  private find(key: K): {leaf: BPlusTreeNode<K, V>; pos: number} | null {
    if (this.tree.isEmpty()) {
      return null;
    }
    const leaf = this.tree.locateLeaf(key);
    const pos = leaf.indexOfKey(key);
    return pos === -1 ? null : {leaf, pos};
  }

  private checkValid(operation: string): void {
    try {
      this.tree.checkValid(this.count);
    } catch (e) {
      this.logWriter.error('Invariant check failed', {
        height: this.tree.height(),
        operation,
        order: this.order,
        size: this.count,
      });
      throw e;
    }
  }
}

function isComparator<K>(
  comparator: Comparator<K> | CompareFn<K> | undefined
): comparator is Comparator<K> | CompareFn<K> {
  return (
    typeof comparator === 'function' ||
    (typeof comparator === 'object' &&
      comparator !== null &&
      typeof comparator.compare === 'function')
  );
}
