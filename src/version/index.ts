export { planSave, planUpdate, planDelete, applyVersion, versionOf } from './version-control.js';
export type { VersionPlan } from './version-control.js';
