import type { Engine } from '../engine';

export interface GraphQLContext {
  engine: Engine;
}

export function createContext(engine: Engine): GraphQLContext {
  return { engine };
}
