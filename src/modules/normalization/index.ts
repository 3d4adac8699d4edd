// Ports
export type { PopulationRepository, PopulationRepoError } from './core/ports.js';

// Population
export { PopulationTable } from './core/population.js';
export { makePopulationRepo, parsePopulationTable } from './shell/repo/population-repo.js';

// Logic
export { PER_CAPITA_UNIT, applyPerCapita, normalizeBundles } from './core/logic.js';

// Errors
export { createPopulationLookupError, type PopulationLookupError } from './core/errors.js';
