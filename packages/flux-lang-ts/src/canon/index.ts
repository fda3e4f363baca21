export { canonicalJsonBytes } from './json.js';
