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

import {assert} from '../base/assert';
import {Favor} from '../base/private_enum';
import {BPlusTree} from './bplus_tree';

// One level's worth of routing (internal node) or storage (leaf node) data.
//
// Ownership flows strictly from a node to its |children|. |parent| and |next|
// are navigation links only: |parent| is followed upwards while splitting, and
// |next| chains the leaves left-to-right for ordered traversal. Internal nodes
// never use |next|.
export class BPlusTreeNode<K, V> {
  static create<K, V>(tree: BPlusTree<K, V>): BPlusTreeNode<K, V> {
    return new BPlusTreeNode<K, V>(tree.nextNodeId(), tree);
  }

  keys: K[];
  values: V[];
  children: Array<BPlusTreeNode<K, V>>;
  parent: BPlusTreeNode<K, V> | null;
  next: BPlusTreeNode<K, V> | null;
  isLeaf: boolean;

  constructor(readonly id: number, private readonly tree: BPlusTree<K, V>) {
    this.keys = [];
    this.values = [];
    this.children = [];
    this.parent = null;
    this.next = null;
    this.isLeaf = true;
  }

  isRoot(): boolean {
    return this.parent === null;
  }

  // Whether the node reached the tree order and has to be split.
  isFull(): boolean {
    return this.keys.length >= this.tree.order;
  }

  // Inserts |key| before the first key that is greater or equal to it, or at
  // the end. The key must not be present yet. Returns the insert position.
  insertKeyOrdered(key: K): number {
    const pos = this.searchKey(key);
    this.keys.splice(pos, 0, key);
    return pos;
  }

  // Associates |value| with the position of |key|. Right after
  // insertKeyOrdered() the value is inserted, otherwise it overwrites the one
  // already stored, so |values| always stays as long as |keys|.
  setValueForKey(key: K, value: V): void {
    const pos = this.indexOfKey(key);
    assert(pos !== -1, `key not found in node ${this.id}`);
    this.setValueAt(pos, value);
  }

  setValueAt(pos: number, value: V): void {
    if (this.values.length < this.keys.length) {
      this.values.splice(pos, 0, value);
    } else {
      this.values[pos] = value;
    }
  }

  // Returns the position of a key comparing equal to |key|, or -1.
  indexOfKey(key: K): number {
    const pos = this.searchKey(key);
    return pos < this.keys.length &&
      this.tree.comparator().compare(this.keys[pos], key) === Favor.TIE
      ? pos
      : -1;
  }

  // Returns the index of the child whose subtree covers |key|. A key equal to
  // a separator belongs to the separator's right child.
  childIndexFor(key: K): number {
    const c = this.tree.comparator();
    const last = this.keys.length - 1;
    if (c.compare(key, this.keys[0]) === Favor.RHS) {
      return 0;
    }
    if (c.compare(key, this.keys[last]) !== Favor.RHS) {
      return last + 1;
    }

    // keys[0] <= key < keys[last]: find the first interior key above |key|.
    let left = 1;
    let right = last;
    while (left < right) {
      const middle = (left + right) >> 1;
      if (c.compare(this.keys[middle], key) === Favor.LHS) {
        right = middle;
      } else {
        left = middle + 1;
      }
    }
    return left;
  }

  // <id>[<key0>|<key1>|...]
  toKeyString(): string {
    return `${this.id}[${this.keys.join('|')}]`;
  }

  // {<value0>/<value1>/...}<parent_id> for leaves and
  // {<child_id0>|<child_id1>|...}<parent_id> for internal nodes.
  toContentString(): string {
    const contents = this.isLeaf
      ? this.values.map((value) => String(value)).join('/')
      : this.children.map((child) => child.id).join('|');
    const parentId = this.parent !== null ? this.parent.id.toString() : '_';
    return `{${contents}}${parentId}`;
  }

  // Returns the position where the key is the closest greater or equals to.
  private searchKey(key: K): number {
    // Binary search.
    let left = 0;
    let right = this.keys.length;
    const c = this.tree.comparator();
    while (left < right) {
      const middle = (left + right) >> 1;
      if (c.compare(this.keys[middle], key) === Favor.RHS) {
        left = middle + 1;
      } else {
        right = middle;
      }
    }

    return left;
  }
}
