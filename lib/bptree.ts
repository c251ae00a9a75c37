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

export {ErrorCode, Order} from './base/enum';
export {Exception} from './base/exception';
export type {Logger, MapOptions} from './base/map_options';
export {options} from './base/options';
export type {Comparator, CompareFn} from './index/comparator';
export {Favor} from './index/comparator';
export {FunctionComparator} from './index/function_comparator';
export {SimpleComparator} from './index/simple_comparator';
export type {SingleKey} from './index/simple_comparator';
export {BPlusTreeMap} from './map/bplus_tree_map';
export {MapEntry} from './map/map_entry';
export {ComparatorSet} from './structs/comparator_set';
