export { triangular, trapezoidal, evaluateMembership, categoryDegrees, fuzzifyVariable } from './membership';
export type {
  TriangularPoints,
  TrapezoidalPoints,
  MembershipShape,
  Universe,
  LinguisticVariable,
  OutputVariable,
  MembershipDegrees,
  FuzzifiedReading
} from './types';
