export { field } from './field.js';
export {
  TypeRegistry,
  defaultRegistry,
  registerType,
  GENERIC_RECORD_TYPE,
} from './type-registry.js';
export { TypeDescriptor, NestedFieldDescriptor } from './type-descriptor.js';
export type { FieldDescriptor, ValueFieldDescriptor } from './type-descriptor.js';
export { defineRecordType, loadTypeDefinitions } from './record-type.js';
export type { DefineRecordTypeOptions } from './record-type.js';
