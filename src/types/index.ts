/**
 * Barrel export for all shared types.
 */
export type { Pokemon, PokemonForm, Ability, Gender, LineageSlot, RawLineage } from './pokemon.js';
export { LINEAGE_POSITIONS } from './lineage.js';
export type { Lineage, LineagePosition, EvolutionEdge } from './lineage.js';
export { DEFAULT_CONFIG } from './config.js';
export type { PokedexConfig, LogLevel } from './config.js';
export type { PageFetcher, StagedRecords, StagingSink } from './store.js';
export type {
    PokemonRow,
    FormRow,
    FormDescriptionRow,
    AbilityRow,
    FormAbilityRow,
    EvolutionRow,
    ForeignKeyViolation,
} from './rows.js';
