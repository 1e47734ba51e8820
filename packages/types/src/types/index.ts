export type { StatementOutputDocument } from './output.js';
