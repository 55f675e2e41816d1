export { fuzzifyInputs, evaluateRules, aggregateActivations, defuzzifyCentroid, infer } from './inference';
export { sampleUniverse, conditionDegree, segmentMoment } from './helpers';
export type {
  RuleCondition,
  FuzzyRule,
  FuzzySystem,
  CrispInputs,
  FuzzifiedInputs,
  RuleActivation,
  AggregateSet,
  InferenceResult
} from './types';
