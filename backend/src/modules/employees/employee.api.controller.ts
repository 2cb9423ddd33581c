/**
 * backend/src/modules/employees/employee.api.controller.ts
 *
 * WHY:
 * - JSON surface over the same service (scripts, health checks, integrations).
 * - API-style responses keep 400 for validation failures.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Errors are thrown; the error handler renders them as JSON.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { EmployeeErrors } from './employee.errors';
import { parseEmployeeId } from './employee.schemas';
import type { EmployeeService } from './employee.service';
import type { EmployeeId } from './employee.types';

function requireEmployeeId(req: FastifyRequest): EmployeeId {
  const employeeId = parseEmployeeId(req.params);
  if (employeeId === null) throw EmployeeErrors.employeeNotFound(null);
  return employeeId;
}

export class EmployeeApiController {
  constructor(private readonly employeeService: EmployeeService) {}

  async list(_req: FastifyRequest, reply: FastifyReply) {
    const employees = await this.employeeService.listRecords();
    return reply.status(200).send({ employees });
  }

  async show(req: FastifyRequest, reply: FastifyReply) {
    const employee = await this.employeeService.getRecord(requireEmployeeId(req));
    return reply.status(200).send({ employee });
  }

  async create(req: FastifyRequest, reply: FastifyReply) {
    const employee = await this.employeeService.createRecord(req.body);
    return reply.status(201).header('location', `/api/employees/${employee.id}`).send({ employee });
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const employee = await this.employeeService.updateRecord(requireEmployeeId(req), req.body);
    return reply.status(200).send({ employee });
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    await this.employeeService.deleteRecord(requireEmployeeId(req));
    return reply.status(204).send();
  }
}
