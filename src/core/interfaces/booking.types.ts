export type BookingMeta = Record<string, unknown>;

export interface Booking {
  id: string;
  service: string;
  date: string; // yyyy-MM-dd
  time: string; // "H:MM AM/PM" or a catalog label such as "Anytime"
  location: string | null;
  createdAt: string; // UTC ISO timestamp
  meta: BookingMeta;
}

export interface NewBooking {
  service: string;
  date: string;
  time: string;
  location?: string | null;
  meta?: BookingMeta;
}

export type BookingFilters = Partial<Pick<Booking, 'service' | 'date' | 'time' | 'location'>>;

export type BookingPatch = Partial<Pick<Booking, 'service' | 'date' | 'time' | 'location' | 'meta'>>;

export interface ModifyBookingDTO {
  id: string;
  patch: {
    date?: string;
    time?: string;
  };
}

export interface AvailabilityCheckResult {
  available: boolean;
  /** Full catalog when available, remaining catalog entries when not. */
  slots: string[];
}

export interface NextAvailableSlot {
  time: string;
  slots: string[];
}

export interface OtherServiceOption {
  service: string;
  time: string;
}

export interface ResolutionResult {
  available: boolean;
  suggestion: string | null;
  alternatives: string[];
  otherOptions: OtherServiceOption[];
}

export interface PriceQuote {
  amount: number;
  discountPercent: number;
  currency: string;
}

export interface ConfirmedBooking extends Booking {
  price: number;
  currency: string;
  discountPercent: number;
  delegated: boolean;
  explanation: string;
  locationAutoSelected: boolean;
  serviceAutoSelected: boolean;
}
