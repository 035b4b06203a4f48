export { GtxConf } from './GtxConf.ts';
export { optionalBooleanSchema, optionalNumberSchema } from './utils/schema.ts';
