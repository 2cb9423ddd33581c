/**
 * backend/src/modules/employees/employee.controller.ts
 *
 * WHY:
 * - Maps browser HTTP (HTML pages + urlencoded forms) -> service calls.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Mutations end in 303 redirect-after-POST.
 * - Validation failures re-render the form (200) with field messages;
 *   every other error goes to the global error handler.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { FieldValidationError } from '../../shared/http/errors';
import type { PageChromeProvider } from '../assets/page-chrome';
import { EmployeeErrors } from './employee.errors';
import { parseEmployeeId, parseNotice, readFormValues } from './employee.schemas';
import type { EmployeeService } from './employee.service';
import {
  EMPLOYEE_FIELDS,
  type EmployeeFieldErrors,
  type EmployeeId,
  type EmployeeRecord,
} from './employee.types';
import { renderEmployeeDetail } from './views/employee-detail.view';
import { renderEmployeeForm } from './views/employee-form.view';
import { renderEmployeeList } from './views/employee-list.view';

function sendHtml(reply: FastifyReply, body: string) {
  return reply.status(200).type('text/html; charset=utf-8').send(body);
}

function requireEmployeeId(req: FastifyRequest): EmployeeId {
  const employeeId = parseEmployeeId(req.params);
  if (employeeId === null) throw EmployeeErrors.employeeNotFound(null);
  return employeeId;
}

export class EmployeeController {
  constructor(
    private readonly deps: {
      employeeService: EmployeeService;
      pageChrome: PageChromeProvider;
    },
  ) {}

  async list(req: FastifyRequest, reply: FastifyReply) {
    const [records, page] = await Promise.all([
      this.deps.employeeService.listRecords(),
      this.deps.pageChrome.forRequest(req),
    ]);

    return sendHtml(reply, renderEmployeeList({ page, records, notice: parseNotice(req.query) }));
  }

  async show(req: FastifyRequest, reply: FastifyReply) {
    const employeeId = requireEmployeeId(req);
    const [record, page] = await Promise.all([
      this.deps.employeeService.getRecord(employeeId),
      this.deps.pageChrome.forRequest(req),
    ]);

    return sendHtml(reply, renderEmployeeDetail({ page, record }));
  }

  async newForm(req: FastifyRequest, reply: FastifyReply) {
    const page = await this.deps.pageChrome.forRequest(req);
    return sendHtml(reply, renderEmployeeForm({ page, existing: null }));
  }

  async editForm(req: FastifyRequest, reply: FastifyReply) {
    const employeeId = requireEmployeeId(req);
    const [existing, page] = await Promise.all([
      this.deps.employeeService.getRecord(employeeId),
      this.deps.pageChrome.forRequest(req),
    ]);

    return sendHtml(reply, renderEmployeeForm({ page, existing }));
  }

  async create(req: FastifyRequest, reply: FastifyReply) {
    const values = readFormValues(req.body);

    try {
      await this.deps.employeeService.createRecord(values);
    } catch (err) {
      if (err instanceof FieldValidationError) {
        return this.rejectForm(req, reply, null, err);
      }
      throw err;
    }

    return reply.redirect('/employees?notice=created', 303);
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const employeeId = requireEmployeeId(req);
    const values = readFormValues(req.body);

    try {
      await this.deps.employeeService.updateRecord(employeeId, values);
    } catch (err) {
      if (err instanceof FieldValidationError) {
        // Re-read so the title/action reflect the stored record (NOT_FOUND propagates).
        const existing = await this.deps.employeeService.getRecord(employeeId);
        return this.rejectForm(req, reply, existing, err);
      }
      throw err;
    }

    return reply.redirect('/employees?notice=updated', 303);
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    const employeeId = requireEmployeeId(req);
    await this.deps.employeeService.deleteRecord(employeeId);

    return reply.redirect('/employees?notice=deleted', 303);
  }

  private async rejectForm(
    req: FastifyRequest,
    reply: FastifyReply,
    existing: EmployeeRecord | null,
    err: FieldValidationError,
  ) {
    const page = await this.deps.pageChrome.forRequest(req);
    const errors: EmployeeFieldErrors = {};
    for (const field of EMPLOYEE_FIELDS) {
      const message = err.fields[field];
      if (message !== undefined) errors[field] = message;
    }

    return sendHtml(
      reply,
      renderEmployeeForm({ page, existing, values: readFormValues(req.body), errors }),
    );
  }
}
