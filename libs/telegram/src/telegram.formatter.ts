import type { AlertDecision } from '@libs/market-data';

export interface VenueLabels {
  venueA: string;
  venueB: string;
}

export const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');

export const formatSpreadPercent = (spread: number): string => `${spread.toFixed(2)}%`;

export const formatDirectionLabel = (
  direction: AlertDecision['direction'],
  venues: VenueLabels,
): string =>
  direction === 'BUY_A_SELL_B'
    ? `Buy on ${venues.venueA} / Sell on ${venues.venueB}`
    : `Sell on ${venues.venueA} / Buy on ${venues.venueB}`;

export const formatSpreadAlert = (
  decision: Pick<AlertDecision, 'pair' | 'spread' | 'direction'>,
  venues: VenueLabels,
): string => {
  const icon = decision.direction === 'BUY_A_SELL_B' ? '🟢' : '🔴';
  return [
    `${icon} <b>${escapeHtml(decision.pair)}</b>`,
    `Spread: ${formatSpreadPercent(decision.spread)}`,
    escapeHtml(formatDirectionLabel(decision.direction, venues)),
  ].join('\n');
};

export const formatStartupMessage = (pairCount: number, venueA: string): string =>
  `🤖 Bot started.\nMonitoring ${pairCount} pairs on ${escapeHtml(venueA)}.`;

export const formatLoopErrorMessage = (message: string): string => `❌ Error: ${escapeHtml(message)}`;
