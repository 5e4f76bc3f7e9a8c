export { classifyDomain, scoreDomains } from './domain';
export type { DomainScore } from './domain';
