export { checkLinearity, useExpression, type UsePosition } from "./linearity.js";
export type { BindingState, FlowState, TrackedBinding } from "./flow-state.js";
