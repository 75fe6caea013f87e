export { LoopController } from './LoopController';
export { ManagedIterator, type ManagedIteratorOptions } from './ManagedIterator';
export { Action, ActionCondition } from './ActionCondition';
export { Comparison, Equals, type Condition } from './Condition';
