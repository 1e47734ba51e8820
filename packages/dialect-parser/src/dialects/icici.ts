import { OPENING_BALANCE_MARKER } from '@ledgerline/types';
import { defineDialect } from './define.js';

/**
 * ICICI Bank account statements.
 *
 * Every `DD-MM-YYYY` line starts a row; mode/particulars lines follow until the
 * amounts, with bare transaction ids interleaved. Only one movement amount is
 * printed, so debit or credit is recovered from the running balance. Each page
 * repeats the six-line column header and is introduced by `Page N of M`.
 */
export const ICICI_DIALECT = defineDialect({
  key: 'icici',
  institution: 'ICICI Bank',
  indicators: ['ICICI BANK', 'ICICI'],
  dateSource: '\\d{2}-\\d{2}-\\d{4}',
  pageMarkers: [{ kind: 'start', source: 'Page\\s+(\\d+)\\s+of\\s+\\d+' }],
  headerLabels: ['DATE', 'MODE**', 'MODE', 'PARTICULARS', 'DEPOSITS', 'WITHDRAWALS', 'BALANCE'],
  headerColumnOrder: ['DATE', 'MODE**', 'PARTICULARS', 'DEPOSITS', 'WITHDRAWALS', 'BALANCE'],
  requireHeaderPerPage: true,
  modeSource: 'labels',
  modeKeywords: [],
  modeLabels: ['MOBILE BANKING', 'ICICI ATM', 'BANK CHARGES', 'CMS TRANSACTION', 'CREDIT CARD'],
  openingBalanceModes: [OPENING_BALANCE_MARKER],
  amountLayout: 'amount-balance',
  splitStrategy: 'balance-delta',
  debitKeywords: [],
  bareIntegerPolicy: 'transaction-id',
  layout: {
    referenceColumn: false,
    confirmDateLookahead: false,
    collectTrailing: false,
  },
  referenceWidth: null,
  summaryMarkers: [],
  footerPhrases: [],
  footerWords: [],
});
