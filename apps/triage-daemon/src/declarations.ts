import type { ExpressApplication } from '@triage/core/feathers';
import type { IncidentsService } from './services/incidents';
import type { WorkerService } from './services/worker';

export interface ServiceTypes {
  incidents: IncidentsService;
  worker: WorkerService;
}

export type Application = ExpressApplication<ServiceTypes>;
