/**
 * Media-type deletion policy
 *
 * @packageDocumentation
 */

export { compileGlob, GlobPattern } from './glob.js';
export {
  shouldDelete,
  compileGlobs,
  BINARY_DELETE_TYPES,
  BINARY_KEEP_TYPES,
} from './media-type-policy.js';
export type { MediaTypeGlob } from './media-type-policy.js';
