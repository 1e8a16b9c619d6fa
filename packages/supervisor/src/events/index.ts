/**
 * Event bus: log reader, writer, classifier and filters
 */

export { EventReader, parseEventLine, eventCursorCodec, type EventCursor, type EventReaderOptions } from './event-reader.js';
export { EventWriter, createEvent, type EventSink } from './event-writer.js';
export {
  classifyEvent,
  classifySignificance,
  deriveWorkspace,
  deriveRole,
  type ClassifierOptions,
} from './classifier.js';
export { summarizeEvent } from './summary.js';
export {
  byWorkspace,
  minSignificance,
  inTimeRange,
  includeTypes,
  excludeTypes,
  applyFilters,
  type EventFilter,
} from './filters.js';
