// Schemas & Types
export { BookingSchema, bookingsResource, type BookingInput } from './bookings.schema.js';

// Routes
export { bookingsRoutes } from './bookings.routes.js';
