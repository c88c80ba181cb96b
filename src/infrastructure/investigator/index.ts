export { HttpInvestigator } from './http-investigator.js';
export type { HttpInvestigatorConfig } from './http-investigator.js';
