// Schemas & Types
export { EventSchema, eventsResource, type EventInput } from './events.schema.js';

// Routes
export { eventsRoutes } from './events.routes.js';
