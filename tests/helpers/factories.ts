import { faker } from '@faker-js/faker';
import type { EventInput } from '../../src/modules/events/index.js';
import type { AttendeeInput } from '../../src/modules/attendees/index.js';
import type { VenueInput } from '../../src/modules/venues/index.js';
import type { BookingInput } from '../../src/modules/bookings/index.js';

// ============================================================================
// Event Factory
// ============================================================================

export function createEventPayload(overrides: Partial<EventInput> = {}): EventInput {
  return {
    name: faker.lorem.words(3),
    description: faker.lorem.sentence(),
    date: faker.date.future().toISOString().slice(0, 10),
    venue_id: faker.database.mongodbObjectId(),
    max_attendees: faker.number.int({ min: 10, max: 500 }),
    ...overrides,
  };
}

// ============================================================================
// Attendee Factory
// ============================================================================

export function createAttendeePayload(overrides: Partial<AttendeeInput> = {}): AttendeeInput {
  return {
    name: faker.person.fullName(),
    email: faker.internet.email(),
    phone: faker.phone.number(),
    ...overrides,
  };
}

// ============================================================================
// Venue Factory
// ============================================================================

export function createVenuePayload(overrides: Partial<VenueInput> = {}): VenueInput {
  return {
    name: faker.company.name(),
    address: faker.location.streetAddress(),
    capacity: faker.number.int({ min: 50, max: 1000 }),
    ...overrides,
  };
}

// ============================================================================
// Booking Factory
// ============================================================================

export function createBookingPayload(overrides: Partial<BookingInput> = {}): BookingInput {
  return {
    event_id: faker.database.mongodbObjectId(),
    attendee_id: faker.database.mongodbObjectId(),
    ticket_type: faker.helpers.arrayElement(['standard', 'vip', 'student']),
    quantity: faker.number.int({ min: 1, max: 5 }),
    ...overrides,
  };
}
