// Schemas & Types
export { AttendeeSchema, attendeesResource, type AttendeeInput } from './attendees.schema.js';

// Routes
export { attendeesRoutes } from './attendees.routes.js';
