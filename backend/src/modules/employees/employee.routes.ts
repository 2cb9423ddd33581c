/**
 * backend/src/modules/employees/employee.routes.ts
 *
 * WHY:
 * - Declares Employees module endpoints (HTML pages + JSON API).
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - Static segments (/employees/new) win over /employees/:id in Fastify's router.
 */

import type { FastifyInstance } from 'fastify';

import type { EmployeeApiController } from './employee.api.controller';
import type { EmployeeController } from './employee.controller';

export function registerEmployeeRoutes(
  app: FastifyInstance,
  controller: EmployeeController,
  api: EmployeeApiController,
) {
  app.get('/', (_req, reply) => reply.redirect('/employees', 302));

  // HTML
  app.get('/employees', controller.list.bind(controller));
  app.get('/employees/new', controller.newForm.bind(controller));
  app.post('/employees', controller.create.bind(controller));
  app.get('/employees/:id', controller.show.bind(controller));
  app.get('/employees/:id/edit', controller.editForm.bind(controller));
  app.post('/employees/:id', controller.update.bind(controller));
  app.post('/employees/:id/delete', controller.remove.bind(controller));

  // JSON API
  app.get('/api/employees', api.list.bind(api));
  app.post('/api/employees', api.create.bind(api));
  app.get('/api/employees/:id', api.show.bind(api));
  app.put('/api/employees/:id', api.update.bind(api));
  app.delete('/api/employees/:id', api.remove.bind(api));
}
