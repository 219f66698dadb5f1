export { describeType, isPlainObject, readSourceEntries } from './source.js';
export { instantiate } from './instantiate.js';
export { castOk, castFail, unwrap } from './result.js';
