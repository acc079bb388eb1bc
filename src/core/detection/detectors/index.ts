import type { DetectorTable } from '../types.js';
import { detectAdapter } from './adapter.js';
import { detectBuilder } from './builder.js';
import { detectCommand } from './command.js';
import { detectCreationFactory, detectTypeCheckFactory } from './factory.js';
import { detectObserver } from './observer.js';
import { detectRepository } from './repository.js';
import { detectSingleton } from './singleton.js';
import { detectStrategy } from './strategy.js';

export {
  detectAdapter,
  detectBuilder,
  detectCommand,
  detectCreationFactory,
  detectObserver,
  detectRepository,
  detectSingleton,
  detectStrategy,
  detectTypeCheckFactory,
};

/**
 * Detectors run per node kind, in this order. Import statements only
 * update analyzer state.
 */
export const DEFAULT_DETECTORS: DetectorTable = {
  class_definition: [detectSingleton, detectBuilder, detectAdapter],
  function_definition: [detectCreationFactory, detectCommand, detectRepository],
  if_statement: [detectStrategy, detectTypeCheckFactory],
  for_statement: [detectObserver],
};
