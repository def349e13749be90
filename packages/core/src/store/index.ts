export { TaskStore } from './task-store.js';
