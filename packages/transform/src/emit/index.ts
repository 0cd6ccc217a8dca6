/**
 * Transform Package - Emit
 *
 * Source generation for the runtime form of decorated classes.
 */

export {
  emitFieldTable,
  emitAccessors,
  emitConstructor,
  emitEqualsDeclaration,
  emitRegistration,
} from "./members.js";
export type { EmitField, EmitKind, EmitOptions } from "./members.js";
export { escapeString, quote, isValidIdentifier, formatPropertyKey } from "./format.js";
