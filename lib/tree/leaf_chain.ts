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

import {BPlusTreeNode} from './bplus_tree_node';

// Walks the leaves left-to-right through their |next| links.
//
// The iterators are lazy, single-use and forward-only. They read the nodes as
// they go, so the tree must not be mutated until the iteration is done.
export class LeafChain {
  // Descends through the first child of every level. Returns null for an empty
  // tree.
  static leftmostLeaf<K, V>(
    root: BPlusTreeNode<K, V> | null
  ): BPlusTreeNode<K, V> | null {
    if (root === null) {
      return null;
    }
    let node = root;
    while (!node.isLeaf) {
      node = node.children[0];
    }
    return node;
  }

  static *leaves<K, V>(
    root: BPlusTreeNode<K, V> | null
  ): IterableIterator<BPlusTreeNode<K, V>> {
    let node = LeafChain.leftmostLeaf(root);
    while (node !== null) {
      yield node;
      node = node.next;
    }
  }

  static *entries<K, V>(
    root: BPlusTreeNode<K, V> | null
  ): IterableIterator<[K, V]> {
    for (const leaf of LeafChain.leaves(root)) {
      for (let i = 0; i < leaf.keys.length; ++i) {
        yield [leaf.keys[i], leaf.values[i]];
      }
    }
  }

  static *keys<K, V>(root: BPlusTreeNode<K, V> | null): IterableIterator<K> {
    for (const leaf of LeafChain.leaves(root)) {
      yield* leaf.keys;
    }
  }

  static *values<K, V>(root: BPlusTreeNode<K, V> | null): IterableIterator<V> {
    for (const leaf of LeafChain.leaves(root)) {
      yield* leaf.values;
    }
  }
}
