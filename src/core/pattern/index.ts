// src/core/pattern/index.ts
// Pattern substrate exports

export type { Pattern, MatchedBy, WithMatch } from "./types";
export { BasePattern, attempt, isMatch, getMatch, isPattern, pattern, guarded } from "./pattern";
export {
  type TypeName,
  type TypeToken,
  type Constructor,
  Predicate,
  predicate,
  sameValueZero,
  Equal,
  Is,
  In,
  Type,
  typeName,
  hasRuntimeType,
  isTypeName,
  isTypeToken,
} from "./predicate";
export { Key, Keys, Attr, Attrs, lookupKey, lookupAttr } from "./access";
export { All, Any, OneOf, Not, AsPredicate, Compose, Many, With, Ignore } from "./combinators";
export { Match, matchValue } from "./match";
