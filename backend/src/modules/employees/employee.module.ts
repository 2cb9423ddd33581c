/**
 * backend/src/modules/employees/employee.module.ts
 *
 * WHY:
 * - Encapsulates Employees module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';

import type { DeleteMissingPolicy } from '../../app/config';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { PageChromeProvider } from '../assets/page-chrome';

import { EmployeeRepo } from './dal/employee.repo';
import { EmployeeApiController } from './employee.api.controller';
import { EmployeeController } from './employee.controller';
import { registerEmployeeRoutes } from './employee.routes';
import { EmployeeService } from './employee.service';

export type EmployeeModule = ReturnType<typeof createEmployeeModule>;

export function createEmployeeModule(deps: {
  db: DbExecutor;
  logger: Logger;
  pageChrome: PageChromeProvider;
  timeoutMs: number;
  deleteMissing: DeleteMissingPolicy;
}) {
  const employeeRepo = new EmployeeRepo(deps.db);

  const employeeService = new EmployeeService({
    db: deps.db,
    logger: deps.logger,
    employeeRepo,
    timeoutMs: deps.timeoutMs,
    deleteMissing: deps.deleteMissing,
  });

  const controller = new EmployeeController({ employeeService, pageChrome: deps.pageChrome });
  const apiController = new EmployeeApiController(employeeService);

  return {
    employeeRepo,
    employeeService,
    registerRoutes(app: FastifyInstance) {
      registerEmployeeRoutes(app, controller, apiController);
    },
  };
}
