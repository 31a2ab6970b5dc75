/**
 * Default progress sink: renders events through the logger.
 */
import { logger } from '../../utils/logger.js';
import type { ProgressSink } from './types.js';

const PHASE_TITLES = {
  parsing: 'Parsing package specifications',
  building: 'Building Lambda layer',
  uploading: 'Publishing layer to AWS',
  done: 'Layer generation complete',
} as const;

export const logProgress: ProgressSink = (event) => {
  logger.step(PHASE_TITLES[event.phase]);
  if (event.message) {
    logger.detail('Status', event.message);
  }
};
