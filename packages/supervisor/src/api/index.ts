export { createSupervisor, EVENT_CURSOR_FILE, type Supervisor, type SupervisorDeps } from './supervisor.js';
