export { typeCallExpr, typeSignatureCall, type CallArgument } from "./call.js";
export {
  typeFieldAccessExpr,
  typeIndexExpr,
  typeMethodCallExpr,
} from "./member.js";
export {
  typeBinaryOperatorExpr,
  typeUnaryOperatorExpr,
} from "./operators.js";
export { ensureTypeMatches, receiverTypeName } from "./shared.js";
export { typeStructLiteralExpr } from "./struct-literal.js";
