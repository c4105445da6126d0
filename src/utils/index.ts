export { toLogicalId } from './naming.js';
