export { FieldMapper } from './field-mapper.js';
export { Transformer } from './transformer.js';
export {
  applyCoercion,
  coerceText,
  coerceNumber,
  coerceInteger,
  coercePointWkt,
  coerceLineStringWkt,
  toFiniteNumber,
} from './coercions.js';
export type { Coerced } from './coercions.js';
