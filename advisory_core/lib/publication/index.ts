export { groupCurrentStatesByVulnerability, projectCurrentStates, toPublishedState } from './currentStates';
export type { PublishedAdvisoryState, VulnerabilityStateGroup } from './currentStates';
