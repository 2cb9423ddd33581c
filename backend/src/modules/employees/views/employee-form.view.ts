/**
 * backend/src/modules/employees/views/employee-form.view.ts
 *
 * WHY:
 * - One form for create (empty) and edit (pre-filled).
 * - After a rejected submit, re-renders the submitted values with
 *   an error message under each invalid field.
 */

import { html, raw, type SafeHtml } from '../../../shared/html/html';
import { renderLayout, type PageChrome } from '../../../shared/html/layout';
import { toFormValues } from '../employee.schemas';
import type {
  EmployeeField,
  EmployeeFieldErrors,
  EmployeeFormValues,
  EmployeeRecord,
} from '../employee.types';

type FieldSpec = {
  field: EmployeeField;
  label: string;
  type: 'text' | 'number' | 'date';
  required: boolean;
};

const FIELD_SPECS: readonly FieldSpec[] = [
  { field: 'name', label: 'Name', type: 'text', required: true },
  { field: 'department', label: 'Department', type: 'text', required: true },
  { field: 'role', label: 'Role', type: 'text', required: false },
  { field: 'salary', label: 'Salary', type: 'number', required: false },
  { field: 'startDate', label: 'Start date', type: 'date', required: false },
];

const EMPTY_VALUES: EmployeeFormValues = {
  name: '',
  department: '',
  role: '',
  salary: '',
  startDate: '',
};

function renderField(spec: FieldSpec, value: string, error: string | undefined): SafeHtml {
  return html`<div class="field${error ? ' has-error' : ''}">
<label for="${spec.field}">${spec.label}</label>
<input id="${spec.field}" name="${spec.field}" type="${spec.type}" value="${value}"${spec.required ? raw(' required') : ''}>
${error ? html`<p class="error" id="${spec.field}-error">${error}</p>` : ''}
</div>`;
}

export function renderEmployeeForm(opts: {
  page: PageChrome;
  existing: EmployeeRecord | null;
  values?: EmployeeFormValues;
  errors?: EmployeeFieldErrors;
}): string {
  const { existing } = opts;
  const values = opts.values ?? (existing ? toFormValues(existing) : EMPTY_VALUES);
  const errors = opts.errors ?? {};

  const title = existing ? `Edit ${existing.name}` : 'Add employee';
  const action = existing ? `/employees/${existing.id}` : '/employees';

  return renderLayout({
    page: opts.page,
    title,
    content: html`<h2>${title}</h2>
<form method="post" action="${action}" novalidate>
${FIELD_SPECS.map((spec) => renderField(spec, values[spec.field], errors[spec.field]))}
<button type="submit">${existing ? 'Save changes' : 'Create employee'}</button>
<a href="/employees">Cancel</a>
</form>`,
  });
}
