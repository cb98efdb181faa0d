import type { NewBooking } from '@core/interfaces/booking.types.js';

import { addDaysISO } from '@utils/time.js';

/** Presentation bookings, dated relative to `todayISO` so they always look current. */
export function buildDemoBookings(todayISO: string): NewBooking[] {
  return [
    {
      service: 'facial + manicure',
      date: addDaysISO(todayISO, 1),
      time: '10:00 AM',
      location: 'vijayawada',
      meta: {
        demo: true,
        salon: 'Salon A',
        salonContact: '+91-90000-00001',
        items: [
          { name: 'Cleansing Facial', price: 1200 },
          { name: 'Manicure', price: 800 },
        ],
        total: 2000,
        currency: 'INR',
      },
    },
    {
      service: 'spa',
      date: addDaysISO(todayISO, 2),
      time: '11:00 AM',
      location: 'mumbai',
      meta: {
        demo: true,
        salon: 'Urban Spa',
        salonContact: '+91-90000-00002',
        items: [{ name: 'Full Body Spa', price: 2500 }],
        total: 2500,
        currency: 'INR',
      },
    },
    {
      service: 'doctor',
      date: addDaysISO(todayISO, 3),
      time: '1:00 PM',
      location: 'delhi',
      meta: {
        demo: true,
        salon: 'City Clinic',
        salonContact: '+91-90000-00003',
        items: [{ name: 'Consultation', price: 500 }],
        total: 500,
        currency: 'INR',
      },
    },
  ];
}
