import { describe, expect, it } from 'vitest';

import type { ConfirmedBooking } from '@core/interfaces/index.js';

import { buildTextReceipt, formatAmount, summarizeBooking } from '@services/receipts/receipt.builder.js';

const booking: ConfirmedBooking = {
  id: 'bkg_0123456789abcdef0123456789abcdef',
  service: 'facial',
  date: '2099-01-01',
  time: '10:00 AM',
  location: 'vijayawada',
  createdAt: '2030-06-01T09:00:00.000Z',
  meta: {},
  price: 1992.6,
  currency: 'INR',
  discountPercent: 10,
  delegated: false,
  explanation: 'Service matched by keyword',
  locationAutoSelected: false,
  serviceAutoSelected: false,
};

describe('receipt builder', () => {
  it('formats amounts with the currency symbol', () => {
    expect(formatAmount(1992.6, 'INR')).toBe('₹1,992.60');
    expect(formatAmount(42.5, 'USD')).toBe('$42.50');
    expect(formatAmount(42.5, 'EUR')).toBe('EUR 42.50');
  });

  it('builds a plain-text receipt', () => {
    expect(buildTextReceipt(booking)).toBe(
      [
        'Booking Receipt',
        '',
        'Booking ID: bkg_0123456789abcdef0123456789abcdef',
        'Created:    2030-06-01T09:00:00.000Z',
        'Service:    facial',
        'Location:   vijayawada',
        'Date:       Thursday, 01 Jan 2099',
        'Time:       10:00 AM',
        'Discount:   10%',
        'Total:      ₹1,992.60',
        '',
        'Explanation: Service matched by keyword',
        '',
        'Thank you for your booking!',
      ].join('\n'),
    );
  });

  it('labels assistant-selected values', () => {
    const receipt = buildTextReceipt({ ...booking, locationAutoSelected: true, serviceAutoSelected: true });
    expect(receipt).toContain('Location:   vijayawada (assistant-selected)');
    expect(receipt).toContain('Note: the service was chosen by the assistant.');
  });

  it('summarizes a booking in one line', () => {
    expect(summarizeBooking(booking)).toBe('facial on Thursday, 01 Jan 2099 at 10:00 AM in vijayawada for ₹1,992.60');
  });
});
