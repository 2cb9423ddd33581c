/**
 * backend/src/modules/employees/views/employee-list.view.ts
 *
 * RULES:
 * - Pure rendering: records + chrome in, HTML string out.
 * - Every value goes through html`` (escaped).
 */

import { html, type SafeHtml } from '../../../shared/html/html';
import { renderLayout, type PageChrome } from '../../../shared/html/layout';
import type { EmployeeNotice } from '../employee.schemas';
import type { EmployeeRecord } from '../employee.types';

const NOTICE_TEXT: Record<EmployeeNotice, string> = {
  created: 'Employee created.',
  updated: 'Employee updated.',
  deleted: 'Employee deleted.',
};

function renderRow(record: EmployeeRecord): SafeHtml {
  return html`<tr>
<td>${record.id}</td>
<td><a href="/employees/${record.id}">${record.name}</a></td>
<td>${record.department}</td>
<td>${record.role}</td>
<td>${record.salary}</td>
<td>${record.startDate}</td>
<td class="actions"><a href="/employees/${record.id}/edit">Edit</a>
<form class="inline" method="post" action="/employees/${record.id}/delete"><button type="submit">Delete</button></form></td>
</tr>`;
}

function renderTable(records: readonly EmployeeRecord[]): SafeHtml {
  if (records.length === 0) {
    return html`<p class="empty">No employees yet.</p>`;
  }

  return html`<table>
<thead><tr><th>ID</th><th>Name</th><th>Department</th><th>Role</th><th>Salary</th><th>Start date</th><th></th></tr></thead>
<tbody>
${records.map(renderRow)}
</tbody>
</table>`;
}

export function renderEmployeeList(opts: {
  page: PageChrome;
  records: readonly EmployeeRecord[];
  notice?: EmployeeNotice | null;
}): string {
  const count = opts.records.length;

  return renderLayout({
    page: opts.page,
    title: 'Employees',
    content: html`${opts.notice ? html`<p class="notice">${NOTICE_TEXT[opts.notice]}</p>` : ''}
<h2>Employees</h2>
<p class="count">${count} ${count === 1 ? 'employee' : 'employees'}</p>
<p><a href="/employees/new">Add employee</a></p>
${renderTable(opts.records)}`,
  });
}
