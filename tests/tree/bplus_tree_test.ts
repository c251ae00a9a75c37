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

import * as chai from 'chai';
import {ErrorCode} from '../../lib/base/enum';
import {Favor} from '../../lib/base/private_enum';
import {SimpleComparator} from '../../lib/index/simple_comparator';
import {BPlusTree} from '../../lib/tree/bplus_tree';
import {BPlusTreeNode} from '../../lib/tree/bplus_tree_node';
import {LeafChain} from '../../lib/tree/leaf_chain';
import {TestUtil} from '../../testing/test_util';

const assert: Chai.AssertStatic = chai.assert;

describe('BPlusTree', () => {
  const c = new SimpleComparator();

  afterEach(() => {
    TestUtil.resetOptions();
  });

  function insertToTree(order: number, keys: number[]): BPlusTree<number, number> {
    const tree = new BPlusTree<number, number>(order, c);
    keys.forEach((key) => tree.put(key, key));
    return tree;
  }

  function range(from: number, to: number): number[] {
    const result: number[] = [];
    for (let i = from; i <= to; ++i) {
      result.push(i);
    }
    return result;
  }

  function getRoot(tree: BPlusTree<number, number>): BPlusTreeNode<number, number> {
    return tree.getRoot() as BPlusTreeNode<number, number>;
  }

  it('checkOrder', () => {
    [2, 1, 0, -4, 3.5, NaN, Infinity].forEach((order) => {
      TestUtil.assertThrowsError(ErrorCode.INVALID_ORDER, () => {
        BPlusTree.checkOrder(order);
      });
    });
    BPlusTree.checkOrder(3);
    BPlusTree.checkOrder(512);

    TestUtil.assertThrowsError(ErrorCode.INVALID_ORDER, () => {
      return new BPlusTree<number, number>(2, c);
    });
  });

  it('emptyTree', () => {
    const tree = insertToTree(4, []);
    assert.isTrue(tree.isEmpty());
    assert.isNull(tree.getRoot());
    assert.equal(0, tree.height());
    assert.equal('', tree.toString());
    tree.checkValid(0);
    TestUtil.assertThrowsError(ErrorCode.EMPTY_TREE, () => {
      tree.locateLeaf(1);
    });
  });

  it('LeafNodeAsRoot', () => {
    const tree = insertToTree(4, [2, 3, 1]);
    assert.equal('0[1|2|3]\n{1/2/3}_\n', tree.toString());
    assert.equal(1, tree.height());
    tree.checkValid(3);
  });

  /**
   * Splits the root leaf to form a new root.
   *
   * 1|2|3
   *
   * insert 4
   *
   *     3
   *    / \
   *  1|2  3|4
   */
  it('FirstInternalNode', () => {
    const tree = insertToTree(4, range(1, 4));
    const expected = [
      '2[3]',
      '{0|1}_',
      '0[1|2]  1[3|4]',
      '{1/2}2  {3/4}2',
      '',
    ].join('\n');
    assert.equal(expected, tree.toString());
    assert.equal(2, tree.height());
    tree.checkValid(4);
  });

  /**
   * Split of a leaf promoting a second separator.
   *
   *       3
   *     /   \
   *  1|2    3|4|5
   *
   * insert 6, 7
   *
   *         3|5
   *     /    |    \
   *  1|2    3|4   5|6|7
   */
  it('Split_Case1', () => {
    const tree = insertToTree(4, range(1, 7));
    const expected = [
      '2[3|5]',
      '{0|1|3}_',
      '0[1|2]  1[3|4]  3[5|6|7]',
      '{1/2}2  {3/4}2  {5/6/7}2',
      '',
    ].join('\n');
    assert.equal(expected, tree.toString());
    tree.checkValid(7);
    assert.deepEqual(range(1, 7), Array.from(LeafChain.keys(tree.getRoot())));
  });

  /**
   * Split of a leaf inducing the split of the internal root and a new level.
   * The internal split moves the children right of the separator along with
   * their keys.
   *
   *             3|5|7
   *     /     |     |     \
   *  1|2    3|4   5|6   7|8|9
   *
   * insert 10
   *
   *                 7
   *           /           \
   *         3|5            9
   *     /    |    \      /   \
   *  1|2   3|4   5|6  7|8   9|10
   */
  it('Split_Case2', () => {
    const tree = insertToTree(4, range(1, 10));
    const expected = [
      '7[7]',
      '{2|6}_',
      '2[3|5]  6[9]',
      '{0|1|3}7  {4|5}7',
      '0[1|2]  1[3|4]  3[5|6]  4[7|8]  5[9|10]',
      '{1/2}2  {3/4}2  {5/6}2  {7/8}6  {9/10}6',
      '',
    ].join('\n');
    assert.equal(expected, tree.toString());
    assert.equal(3, tree.height());
    tree.checkValid(10);
  });

  /**
   * With an odd order the left half takes floor(order / 2) keys.
   *
   * 1|2|3|4  insert 5  =>       3
   *                           /   \
   *                        1|2    3|4|5
   */
  it('Split_OddOrder', () => {
    const tree = insertToTree(5, range(1, 5));
    const expected = [
      '2[3]',
      '{0|1}_',
      '0[1|2]  1[3|4|5]',
      '{1/2}2  {3/4/5}2',
      '',
    ].join('\n');
    assert.equal(expected, tree.toString());
    tree.checkValid(5);
  });

  it('Split_MinimumOrder', () => {
    const tree = insertToTree(3, range(1, 5));
    const expected = [
      '6[3]',
      '{2|5}_',
      '2[2]  5[4]',
      '{0|1}6  {3|4}6',
      '0[1]  1[2]  3[3]  4[4|5]',
      '{1}2  {2}2  {3}5  {4/5}5',
      '',
    ].join('\n');
    assert.equal(expected, tree.toString());
    tree.checkValid(5);
  });

  it('RoundTripShape', () => {
    const tree = insertToTree(4, [10, 20, 5, 15, 25, 1, 30]);
    const expected = [
      '2[15|25]',
      '{0|1|3}_',
      '0[1|5|10]  1[15|20]  3[25|30]',
      '{1/5/10}2  {15/20}2  {25/30}2',
      '',
    ].join('\n');
    assert.equal(expected, tree.toString());
    tree.checkValid(7);
  });

  it('locateLeaf', () => {
    const tree = insertToTree(4, range(1, 10));
    assert.equal(0, tree.locateLeaf(0).id);
    assert.equal(0, tree.locateLeaf(2).id);
    assert.equal(1, tree.locateLeaf(3).id);
    assert.equal(3, tree.locateLeaf(6.5).id);
    assert.equal(4, tree.locateLeaf(7).id);
    assert.equal(5, tree.locateLeaf(9).id);
    assert.equal(5, tree.locateLeaf(100).id);
  });

  it('put', () => {
    const tree = new BPlusTree<number, string>(4, c);
    assert.isTrue(tree.put(1, 'a'));
    assert.isTrue(tree.put(2, 'b'));
    assert.isFalse(tree.put(1, 'c'));
    assert.equal('0[1|2]\n{c/b}_\n', tree.toString());
    tree.checkValid(2);
  });

  it('overwriteDoesNotSplit', () => {
    const tree = insertToTree(4, [1, 2, 3]);
    tree.put(2, 20);
    assert.equal('0[1|2|3]\n{1/20/3}_\n', tree.toString());
  });

  it('parentLinks', () => {
    const tree = insertToTree(4, range(1, 10));
    const root = getRoot(tree);
    assert.isNull(root.parent);
    root.children.forEach((internal) => {
      assert.strictEqual(root, internal.parent);
      internal.children.forEach((leaf) => {
        assert.strictEqual(internal, leaf.parent);
      });
    });
    assert.isNull(root.next);
    assert.isNull(root.children[0].next);
  });

  it('scrambledInsert', () => {
    const keys = TestUtil.scrambled(211);
    [3, 4, 5, 8, 16].forEach((order) => {
      const tree = insertToTree(order, keys);
      tree.checkValid(keys.length);
      assert.deepEqual(
        range(0, 210),
        Array.from(LeafChain.keys(tree.getRoot()))
      );
      keys.forEach((key) => {
        const leaf = tree.locateLeaf(key);
        assert.notEqual(-1, leaf.indexOfKey(key));
      });
    });
  });

  it('descendingInsert', () => {
    const keys = range(1, 50).reverse();
    const tree = insertToTree(4, keys);
    tree.checkValid(50);
    assert.deepEqual(range(1, 50), Array.from(LeafChain.keys(tree.getRoot())));
  });

  it('checkValid_DetectsCorruption', () => {
    const tree = insertToTree(4, range(1, 7));
    const root = getRoot(tree);

    // Routing key out of place.
    root.keys[0] = 100;
    TestUtil.assertThrowsError(ErrorCode.ASSERTION, () => tree.checkValid());
    root.keys[0] = 3;
    tree.checkValid(7);

    // Broken leaf chain.
    const first = root.children[0];
    const next = first.next;
    first.next = null;
    TestUtil.assertThrowsError(ErrorCode.ASSERTION, () => tree.checkValid());
    first.next = next;

    // Lost parent link.
    first.parent = null;
    TestUtil.assertThrowsError(ErrorCode.ASSERTION, () => tree.checkValid());
    first.parent = root;

    // Wrong entry count.
    TestUtil.assertThrowsError(ErrorCode.ASSERTION, () => tree.checkValid(8));
    tree.checkValid(7);
  });

  it('split_Precondition', () => {
    TestUtil.setDebug();
    const tree = insertToTree(4, [1, 2]);
    const leaf = getRoot(tree);
    TestUtil.assertThrowsError(ErrorCode.ASSERTION, () => {
      tree['split'](leaf);
    });
    assert.equal('0[1|2]\n{1/2}_\n', tree.toString());
  });

  it('logsGrowthInDebugMode', () => {
    const opt = TestUtil.setDebug();
    insertToTree(4, range(1, 10));
    assert.deepEqual(
      [
        'Tree grew a level. order: 4, height: 2, nodeId: 2',
        'Tree grew a level. order: 4, height: 3, nodeId: 7',
      ],
      opt.logger.loggedMessages
    );
  });

  it('customComparator', () => {
    const tree = new BPlusTree<string, number>(3, {
      compare: (lhs: string, rhs: string): Favor => {
        const l = lhs.toLowerCase();
        const r = rhs.toLowerCase();
        return l > r ? Favor.LHS : l < r ? Favor.RHS : Favor.TIE;
      },
    });
    tree.put('b', 1);
    tree.put('A', 2);
    assert.isFalse(tree.put('B', 3));
    assert.equal('0[A|b]\n{2/3}_\n', tree.toString());
  });
});
