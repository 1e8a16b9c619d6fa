export type {
  SessionController,
  LedgerRecordFields,
  LedgerRecord,
  LedgerQuery,
  WorkLedger,
} from './types.js';
