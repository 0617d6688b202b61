// Pure formatting helpers for the account snapshot written to stdout

import type { AccountSnapshot } from '@txledger/core';

export const ACCOUNT_CSV_HEADERS = ['client', 'available', 'held', 'total', 'locked'] as const;

/**
 * Escape one field per RFC 4180: quote fields containing commas, quotes, or
 * line breaks and double any internal quotes.
 */
export function escapeCsvField(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replaceAll('"', '""')}"`;
  }
  return value;
}

/**
 * Render account snapshots as CSV, header first, one line per account in the
 * order given. The result always ends with a newline.
 */
export function formatAccountsCsv(accounts: readonly AccountSnapshot[]): string {
  const csvLines = [ACCOUNT_CSV_HEADERS.join(',')];

  for (const account of accounts) {
    const values = [
      String(account.client),
      account.available,
      account.held,
      account.total,
      String(account.locked),
    ];
    csvLines.push(values.map(escapeCsvField).join(','));
  }

  return csvLines.join('\n') + '\n';
}
