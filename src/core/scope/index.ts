export { fileInScope, globToMatcher, globToRegExp, matchesAny, pathMatches } from './matcher.js';
export { resolveImportPath } from './resolve.js';
