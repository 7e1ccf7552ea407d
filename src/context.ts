import { AttackTables, attackTables } from './attacks.js';
import { ZobristHasher, zobristHasher } from './zobrist.js';

/**
 * Read-only lookup state shared by positions: attack tables and hash
 * values. Positions derived from one another share their context.
 */
export interface EngineContext {
  readonly tables: AttackTables;
  readonly zobrist: ZobristHasher;
}

export const createContext = (opts?: Partial<EngineContext>): EngineContext => ({
  tables: opts?.tables ?? new AttackTables(),
  zobrist: opts?.zobrist ?? new ZobristHasher(),
});

let sharedContext: EngineContext | undefined;

/** Context over the process wide tables and hasher. */
export const defaultContext = (): EngineContext => {
  if (!sharedContext) sharedContext = { tables: attackTables(), zobrist: zobristHasher() };
  return sharedContext;
};
