export * from './api/auth';
export * from './api/roster';
export * from './api/pairing';
export {
  BULK_FIELD_ALIASES,
  SINGLE_FIELD_ALIASES,
  resolveAliasedFields,
  type FieldAliases,
} from './aliases';
