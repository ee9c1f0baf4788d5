// Schemas & Types
export { VenueSchema, venuesResource, type VenueInput } from './venues.schema.js';

// Routes
export { venuesRoutes } from './venues.routes.js';
