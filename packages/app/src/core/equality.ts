import type { JsonArray, JsonObject, JsonValue } from "./json.js"
import { numberEquals } from "./json-number.js"

// CHANGE: structural equality for the value tree
// WHY: the negative-zero check and round-trip assertions compare values, not references
// REF: req-value-equality-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a,b: jsonEquals(a,b) = jsonEquals(b,a)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object comparison ignores key order, array comparison does not
// COMPLEXITY: O(n)

const arraysEqual = (left: JsonArray, right: JsonArray): boolean =>
  left.values.length === right.values.length &&
  left.values.every((value, index) => {
    const other = right.values[index]
    return other !== undefined && jsonEquals(value, other)
  })

const objectsEqual = (left: JsonObject, right: JsonObject): boolean => {
  if (left.fields.size !== right.fields.size) {
    return false
  }
  for (const [key, value] of left.fields) {
    const other = right.fields.get(key)
    if (other === undefined || !jsonEquals(value, other)) {
      return false
    }
  }
  return true
}

/**
 * Compare two values.
 *
 * Numbers compare by logical value across kinds, keeping negative zero apart
 * from zero.
 *
 * @pure true
 * @complexity O(n)
 */
export const jsonEquals = (left: JsonValue, right: JsonValue): boolean => {
  switch (left._tag) {
    case "Null":
      return right._tag === "Null"
    case "Bool":
      return right._tag === "Bool" && left.value === right.value
    case "String":
      return right._tag === "String" && left.value === right.value
    case "Number":
      return right._tag === "Number" && numberEquals(left.value, right.value)
    case "Array":
      return right._tag === "Array" && arraysEqual(left, right)
    case "Object":
      return right._tag === "Object" && objectsEqual(left, right)
  }
}
