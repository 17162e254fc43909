export { randomInt, sha256 } from './random.js';
