export { AdmissionController } from './controller.ts';
export type { AcquireOptions, AdmissionStats, AdmissionTicket } from './controller.ts';
