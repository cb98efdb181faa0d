import type { ConfirmedBooking } from '@core/interfaces/booking.types.js';

import { formatDisplayDate } from '@utils/time.js';

const SYMBOLS: Record<string, string> = { INR: '₹', USD: '$' };

const amountFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatAmount(amount: number, currency: string): string {
  const symbol = Object.prototype.hasOwnProperty.call(SYMBOLS, currency) ? SYMBOLS[currency] : `${currency} `;
  return `${symbol}${amountFormat.format(amount)}`;
}

/** One-line summary for chat replies. */
export function summarizeBooking(booking: ConfirmedBooking): string {
  const where = booking.location ? ` in ${booking.location}` : '';
  return `${booking.service} on ${formatDisplayDate(booking.date)} at ${booking.time}${where} for ${formatAmount(
    booking.price,
    booking.currency,
  )}`;
}

export function buildTextReceipt(booking: ConfirmedBooking): string {
  const lines = [
    'Booking Receipt',
    '',
    `Booking ID: ${booking.id}`,
    `Created:    ${booking.createdAt}`,
    `Service:    ${booking.service}`,
    `Location:   ${booking.location ?? '-'}${booking.locationAutoSelected ? ' (assistant-selected)' : ''}`,
    `Date:       ${formatDisplayDate(booking.date)}`,
    `Time:       ${booking.time}`,
    `Discount:   ${booking.discountPercent}%`,
    `Total:      ${formatAmount(booking.price, booking.currency)}`,
  ];

  if (booking.serviceAutoSelected) {
    lines.push('', 'Note: the service was chosen by the assistant.');
  }
  if (booking.delegated) {
    lines.push('', 'Note: booking choices were delegated to the assistant.');
  }
  if (booking.explanation) {
    lines.push('', `Explanation: ${booking.explanation}`);
  }
  lines.push('', 'Thank you for your booking!');
  return lines.join('\n');
}
