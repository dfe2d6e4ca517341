export { RecordCatalog, type RecordCatalogOptions } from "./catalog.js";
export {
  EntityRecordType,
  type RecordServices,
  type RelationTableEntry,
} from "./entity-record-type.js";
export { EntityRecord, type RelationHandle } from "./entity-record.js";
