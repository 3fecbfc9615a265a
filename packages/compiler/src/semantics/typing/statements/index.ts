export { createBinding, typeAssignStatement } from "./assign.js";
export { typeIfStatement } from "./if.js";
export { typeForStatement, typeWhileStatement } from "./loops.js";
