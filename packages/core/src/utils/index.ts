export { canOverride } from "./provenance.js";
export { formatStoreObjectName, isSameStoreObject, storeObjectKey } from "./store-object.js";
