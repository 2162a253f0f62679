/**
 * Employee Repository
 * CRUD operations for employees table
 */

import { randomUUID } from 'crypto';
import { execute, select } from '../database';
import type { Employee, CreateEmployeeInput, UpdateEmployeeInput, EmployeeFilter } from '../../types';
import type { EmployeeRow, CountRow } from '../../types/api';

export const DEFAULT_WORK_FRACTION = 1;
export const DEFAULT_DAILY_HOURS = 8;

/**
 * Generate a unique ID for new employees
 */
function generateId(): string {
  return randomUUID();
}

/**
 * Get current ISO timestamp
 */
function now(): string {
  return new Date().toISOString();
}

/**
 * Map database row to Employee model
 */
function mapRowToEmployee(row: EmployeeRow): Employee {
  return {
    id: row.id,
    employeeCode: row.employee_code,
    fullName: row.full_name,
    departmentId: row.department_id,
    workFraction: row.work_fraction,
    dailyHours: row.daily_hours,
    isActive: row.is_active === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Get an employee by ID
 */
export async function getEmployeeById(id: string): Promise<Employee | null> {
  const rows = await select<EmployeeRow>('SELECT * FROM employees WHERE id = ?', [id]);
  const row = rows[0];
  return row ? mapRowToEmployee(row) : null;
}

/**
 * Get an employee by badge/personnel code
 */
export async function getEmployeeByCode(employeeCode: string): Promise<Employee | null> {
  const rows = await select<EmployeeRow>('SELECT * FROM employees WHERE employee_code = ?', [employeeCode]);
  const row = rows[0];
  return row ? mapRowToEmployee(row) : null;
}

/**
 * List employees, active only unless the filter says otherwise
 */
export async function listEmployees(filter: EmployeeFilter = {}): Promise<Employee[]> {
  let query = 'SELECT * FROM employees WHERE 1=1';
  const params: unknown[] = [];

  if (filter.activeOnly !== false) {
    query += ' AND is_active = 1';
  }
  if (filter.departmentId) {
    query += ' AND department_id = ?';
    params.push(filter.departmentId);
  }

  query += ' ORDER BY employee_code ASC';

  const rows = await select<EmployeeRow>(query, params);
  return rows.map(mapRowToEmployee);
}

/**
 * Create a new employee
 */
export async function createEmployee(data: CreateEmployeeInput): Promise<Employee> {
  const id = generateId();
  const timestamp = now();

  await execute(
    `INSERT INTO employees
     (id, employee_code, full_name, department_id, work_fraction, daily_hours, is_active, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      id,
      data.employeeCode,
      data.fullName,
      data.departmentId ?? null,
      data.workFraction ?? DEFAULT_WORK_FRACTION,
      data.dailyHours ?? DEFAULT_DAILY_HOURS,
      data.isActive === false ? 0 : 1,
      timestamp,
      timestamp,
    ]
  );

  const employee = await getEmployeeById(id);
  if (!employee) {
    throw new Error('Failed to create employee');
  }
  return employee;
}

/**
 * Update an existing employee
 */
export async function updateEmployee(id: string, data: UpdateEmployeeInput): Promise<Employee> {
  const updates: string[] = [];
  const values: unknown[] = [];

  if (data.fullName !== undefined) {
    updates.push('full_name = ?');
    values.push(data.fullName);
  }
  if (data.departmentId !== undefined) {
    updates.push('department_id = ?');
    values.push(data.departmentId);
  }
  if (data.workFraction !== undefined) {
    updates.push('work_fraction = ?');
    values.push(data.workFraction);
  }
  if (data.dailyHours !== undefined) {
    updates.push('daily_hours = ?');
    values.push(data.dailyHours);
  }
  if (data.isActive !== undefined) {
    updates.push('is_active = ?');
    values.push(data.isActive ? 1 : 0);
  }

  if (updates.length > 0) {
    updates.push('updated_at = ?');
    values.push(now(), id);
    await execute(`UPDATE employees SET ${updates.join(', ')} WHERE id = ?`, values);
  }

  const updated = await getEmployeeById(id);
  if (!updated) {
    throw new Error(`Employee not found: ${id}`);
  }
  return updated;
}

export async function getEmployeeCounts(): Promise<{ active: number; inactive: number }> {
  const rows = await select<{ is_active: number; count: number }>(
    'SELECT is_active, COUNT(*) as count FROM employees GROUP BY is_active'
  );
  let active = 0;
  let inactive = 0;
  for (const row of rows) {
    if (row.is_active === 1) active = row.count;
    else inactive += row.count;
  }
  return { active, inactive };
}

export async function getActiveEmployeeCount(): Promise<number> {
  const rows = await select<CountRow>('SELECT COUNT(*) as count FROM employees WHERE is_active = 1');
  return rows[0]?.count ?? 0;
}

export const employeeRepository = {
  getEmployeeById,
  getEmployeeByCode,
  listEmployees,
  createEmployee,
  updateEmployee,
  getEmployeeCounts,
  getActiveEmployeeCount,
};
