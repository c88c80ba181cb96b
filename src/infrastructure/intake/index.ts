export { default as intakePlugin } from './intake-plugin.js';
export type { IntakePluginOptions } from './intake-plugin.js';
