export { formatInstanceKey, isConcreteNat } from "./instance-key.js";
export {
  MonomorphisationEngine,
  type SpecializedFunction,
  type SpecializedStruct,
} from "./specialize.js";
