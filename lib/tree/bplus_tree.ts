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
import {ErrorCode} from '../base/enum';
import {Exception} from '../base/exception';
import {Global} from '../base/global';
import {LogWriter} from '../base/log_writer';
import {Favor} from '../base/private_enum';
import {Comparator} from '../index/comparator';
import {BPlusTreeNode} from './bplus_tree_node';
import {LeafChain} from './leaf_chain';

// Lower/upper routing bound of a subtree, null when unbounded.
type Bound<K> = {key: K} | null;

// The B+ tree behind BPlusTreeMap. Owns the root node and, through the child
// links, every other node. Not safe for concurrent mutation: callers serialize
// put() externally.
export class BPlusTree<K, V> {
  // Smallest order that can satisfy both the split and the minimum fill rules.
  static MIN_ORDER = 3;

  static checkOrder(order: number): void {
    if (!Number.isInteger(order) || order < BPlusTree.MIN_ORDER) {
      // 100: Invalid tree order {0}, must be an integer of at least 3.
      throw new Exception(ErrorCode.INVALID_ORDER, String(order));
    }
  }

  private root: BPlusTreeNode<K, V> | null;
  private nodeCount: number;

  constructor(
    readonly order: number,
    private readonly comparatorObj: Comparator<K>,
    private readonly logWriter: LogWriter = new LogWriter()
  ) {
    BPlusTree.checkOrder(order);
    this.root = null;
    this.nodeCount = 0;
  }

  comparator(): Comparator<K> {
    return this.comparatorObj;
  }

  getRoot(): BPlusTreeNode<K, V> | null {
    return this.root;
  }

  setRoot(root: BPlusTreeNode<K, V>): void {
    this.root = root;
  }

  isEmpty(): boolean {
    return this.root === null;
  }

  // Node ids are handed out in creation order and only label nodes in dumps.
  nextNodeId(): number {
    return this.nodeCount++;
  }

  // Number of levels, 0 for an empty tree.
  height(): number {
    let height = 0;
    let node = this.root;
    while (node !== null) {
      height++;
      node = node.isLeaf ? null : node.children[0];
    }
    return height;
  }

  // Returns the leaf that holds |key|, or the one it has to be inserted into.
  locateLeaf(key: K): BPlusTreeNode<K, V> {
    if (this.root === null) {
      // 201: The tree is empty.
      throw new Exception(ErrorCode.EMPTY_TREE);
    }
    let node = this.root;
    while (!node.isLeaf) {
      node = node.children[node.childIndexFor(key)];
    }
    return node;
  }

  // Inserts or overwrites a pair. Returns true if the key was not present.
  //
  // Every comparison happens before the first write, so a throwing comparator
  // leaves the tree untouched.
  put(key: K, value: V): boolean {
    if (this.root === null) {
      const leaf = BPlusTreeNode.create(this);
      leaf.keys.push(key);
      leaf.values.push(value);
      this.setRoot(leaf);
      return true;
    }

    const leaf = this.locateLeaf(key);
    const pos = leaf.indexOfKey(key);
    if (pos !== -1) {
      leaf.setValueAt(pos, value);
      return false;
    }

    leaf.setValueAt(leaf.insertKeyOrdered(key), value);
    if (leaf.isFull()) {
      this.split(leaf);
    }
    return true;
  }

  // Dumps the tree level by level, top-down. For example, if the tree is
  //
  //            3|5
  //       /     |     \
  //     1|2    3|4    5|6|7
  //
  // and the values of the tree are identical to the keys, then the output will
  // be
  //
  // 2[3|5]
  // {0|1|3}_
  // 0[1|2]  1[3|4]  3[5|6|7]
  // {1/2}2  {3/4}2  {5/6/7}2
  //
  // Each tree level contains two lines, the first line is the key line
  // containing keys of each node in the format of
  // <node_id>[<key0>|<key1>|...|<keyN-1>]. The second line is the content line
  // in the format of {<value0>/<value1>/...}<parent_node_id> for leaves and
  // {<child_id0>|<child_id1>|...}<parent_node_id> for internal nodes. The root
  // node does not have parent so its parent node id is denoted as underscore.
  toString(): string {
    let result = '';
    let level: Array<BPlusTreeNode<K, V>> = this.root !== null ? [this.root] : [];
    while (level.length) {
      result += level.map((node) => node.toKeyString()).join('  ') + '\n';
      result += level.map((node) => node.toContentString()).join('  ') + '\n';
      const nextLevel: Array<BPlusTreeNode<K, V>> = [];
      level.forEach((node) => nextLevel.push(...node.children));
      level = nextLevel;
    }
    return result;
  }

  // Verifies every structural invariant and throws ASSERTION on the first
  // violation. |expectedSize|, when given, is compared with the number of
  // entries found on the leaf chain.
  checkValid(expectedSize?: number): void {
    if (this.root === null) {
      assert(
        expectedSize === undefined || expectedSize === 0,
        `empty tree, expected ${expectedSize} entries`
      );
      return;
    }

    assert(this.root.isRoot(), `root ${this.root.id} has a parent`);
    const leaves: Array<BPlusTreeNode<K, V>> = [];
    const leafDepths = new Set<number>();
    this.checkNode(this.root, 0, null, null, leaves, leafDepths);
    assert(leafDepths.size === 1, 'leaves are not all at the same depth');

    // The chain must visit exactly the leaves found through the child links,
    // in the same order, with strictly ascending keys.
    const c = this.comparatorObj;
    let i = 0;
    let count = 0;
    let previous: Bound<K> = null;
    for (const leaf of LeafChain.leaves(this.root)) {
      assert(leaf === leaves[i], `leaf chain broken at node ${leaf.id}`);
      for (const key of leaf.keys) {
        assert(
          previous === null || c.compare(previous.key, key) === Favor.RHS,
          `leaf chain out of order at node ${leaf.id}`
        );
        previous = {key};
        count++;
      }
      i++;
    }
    assert(i === leaves.length, 'leaf chain ends early');
    assert(
      expectedSize === undefined || expectedSize === count,
      `expected ${expectedSize} entries, found ${count}`
    );
  }

  // Split the node that reached the tree order into two nodes. The node keeps
  // the left half, a new node of the same role takes the right half, and the
  // separator goes up into the parent, or into a new root.
  private split(node: BPlusTreeNode<K, V>): void {
    if (Global.get().getOptions().debugMode) {
      assert(
        node.keys.length === this.order,
        `split of node ${node.id} holding ${node.keys.length} keys`
      );
    }

    const half = this.order >> 1;
    const separator = node.keys[half];
    const right = BPlusTreeNode.create(this);
    right.isLeaf = node.isLeaf;

    if (node.isLeaf) {
      // The separator is copied up and stays as the first key of |right|.
      right.keys = node.keys.splice(half);
      right.values = node.values.splice(half);
      right.next = node.next;
      node.next = right;
    } else {
      // The separator is moved up, each side keeps one more child than keys.
      right.keys = node.keys.splice(half + 1);
      node.keys.splice(half, 1);
      right.children = node.children.splice(half + 1);
      right.children.forEach((child) => (child.parent = right));
    }

    const parent = node.parent;
    if (parent === null) {
      const root = BPlusTreeNode.create(this);
      root.isLeaf = false;
      root.keys = [separator];
      root.children = [node, right];
      node.parent = root;
      right.parent = root;
      this.setRoot(root);
      this.logWriter.log('Tree grew a level', {
        height: this.height(),
        nodeId: root.id,
        order: this.order,
      });
      return;
    }

    const pos = parent.children.indexOf(node);
    parent.children.splice(pos + 1, 0, right);
    parent.keys.splice(pos, 0, separator);
    parent.isLeaf = false;
    right.parent = parent;
    if (parent.isFull()) {
      this.split(parent);
    }
  }

  private checkNode(
    node: BPlusTreeNode<K, V>,
    depth: number,
    low: Bound<K>,
    high: Bound<K>,
    leaves: Array<BPlusTreeNode<K, V>>,
    leafDepths: Set<number>
  ): void {
    const c = this.comparatorObj;
    const id = node.id;
    assert(node.keys.length > 0, `node ${id} is empty`);
    assert(
      node.keys.length <= this.order - 1,
      `node ${id} holds ${node.keys.length} keys`
    );
    node.keys.forEach((key, i) => {
      assert(
        i === 0 || c.compare(node.keys[i - 1], key) === Favor.RHS,
        `keys of node ${id} are not strictly ascending`
      );
      assert(
        low === null || c.compare(key, low.key) !== Favor.RHS,
        `key of node ${id} below its routing range`
      );
      assert(
        high === null || c.compare(key, high.key) === Favor.RHS,
        `key of node ${id} above its routing range`
      );
    });

    if (node.isLeaf) {
      assert(
        node.values.length === node.keys.length,
        `leaf ${id} has ${node.values.length} values`
      );
      assert(node.children.length === 0, `leaf ${id} has children`);
      leaves.push(node);
      leafDepths.add(depth);
      return;
    }

    assert(
      node.children.length === node.keys.length + 1,
      `internal node ${id} has ${node.children.length} children`
    );
    assert(node.next === null, `internal node ${id} is chained`);
    node.children.forEach((child, i) => {
      assert(child.parent === node, `child ${child.id} of ${id} lost parent`);
      this.checkNode(
        child,
        depth + 1,
        i === 0 ? low : {key: node.keys[i - 1]},
        i === node.keys.length ? high : {key: node.keys[i]},
        leaves,
        leafDepths
      );
    });
  }
}
