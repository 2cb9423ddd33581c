import { html } from '../../../shared/html/html';
import { renderLayout, type PageChrome } from '../../../shared/html/layout';
import type { EmployeeRecord } from '../employee.types';

export function renderEmployeeDetail(opts: { page: PageChrome; record: EmployeeRecord }): string {
  const { record } = opts;

  return renderLayout({
    page: opts.page,
    title: record.name,
    content: html`<h2>${record.name}</h2>
<dl>
<dt>ID</dt><dd>${record.id}</dd>
<dt>Department</dt><dd>${record.department}</dd>
<dt>Role</dt><dd>${record.role ?? '-'}</dd>
<dt>Salary</dt><dd>${record.salary ?? '-'}</dd>
<dt>Start date</dt><dd>${record.startDate ?? '-'}</dd>
</dl>
<p><a href="/employees/${record.id}/edit">Edit</a> | <a href="/employees">Back to employees</a></p>`,
  });
}
