import { OPENING_BALANCE_MARKER } from '@ledgerline/types';
import { defineDialect } from './define.js';

const HEADER_COLUMNS = [
  'Date',
  'Narration',
  'Chq./Ref.No.',
  'Value Dt',
  'Withdrawal Amt.',
  'Deposit Amt.',
  'Closing Balance',
] as const;

/**
 * HDFC Bank savings/current account statements.
 *
 * One transaction spans: date (often with the first narration line glued on),
 * further narration lines, a reference (sometimes fused with the value date),
 * the value date, a movement amount, the closing balance, then optional free text.
 * Pages open with `--- Page N ---` and close with `Page No .: N`.
 */
export const HDFC_DIALECT = defineDialect({
  key: 'hdfc',
  institution: 'HDFC Bank',
  indicators: ['HDFC BANK', 'HDFC'],
  dateSource: '\\d{2}/\\d{2}/(?:\\d{4}|\\d{2})',
  pageMarkers: [
    { kind: 'start', source: '-{2,}\\s*Page\\s+(\\d+)\\s*-{2,}' },
    { kind: 'end', source: 'Page\\s+No\\s*\\.?\\s*:\\s*(\\d+)' },
  ],
  headerLabels: [...HEADER_COLUMNS, 'Chq/Ref No', 'Withdrawal Amt', 'Deposit Amt'],
  headerColumnOrder: HEADER_COLUMNS,
  requireHeaderPerPage: false,
  modeSource: 'keywords',
  modeKeywords: ['UPI', 'NEFT', 'IMPS', 'ATM', 'POS', 'TRANSFER', 'PAYMENT', 'CHEQUE', 'ECS', 'DD', 'RTGS'],
  modeLabels: [],
  openingBalanceModes: [OPENING_BALANCE_MARKER],
  amountLayout: 'amount-balance',
  splitStrategy: 'keyword-guess',
  debitKeywords: ['upi', 'payment', 'withdrawal', 'debit', 'atm', 'neft', 'imps'],
  bareIntegerPolicy: 'length-rule',
  layout: {
    referenceColumn: true,
    confirmDateLookahead: true,
    collectTrailing: true,
  },
  referenceWidth: 16,
  summaryMarkers: ['STATEMENT SUMMARY'],
  footerPhrases: [
    'Generated On:',
    'Generated By:',
    'Requesting Branch Code:',
    'This is a computer generated statement',
  ],
  footerWords: ['Generated', 'Requesting', 'This', 'computer', 'generated', 'statement', 'signature'],
});
