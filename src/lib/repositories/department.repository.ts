/**
 * Department Repository
 * CRUD operations for departments table
 */

import { randomUUID } from 'crypto';
import { execute, select } from '../database';
import type { Department, CreateDepartmentInput } from '../../types';
import type { DepartmentRow } from '../../types/api';

/**
 * Map database row to Department model
 */
function mapRowToDepartment(row: DepartmentRow): Department {
  return {
    id: row.id,
    name: row.name,
    createdAt: row.created_at,
    memberCount: row.member_count ?? 0,
  };
}

/**
 * Get a department by ID
 */
export async function getDepartmentById(id: string): Promise<Department | null> {
  const rows = await select<DepartmentRow>(
    `SELECT d.*, COUNT(e.id) as member_count
     FROM departments d
     LEFT JOIN employees e ON e.department_id = d.id AND e.is_active = 1
     WHERE d.id = ?
     GROUP BY d.id`,
    [id]
  );
  const row = rows[0];
  return row ? mapRowToDepartment(row) : null;
}

/**
 * List all departments with active member counts
 */
export async function listDepartments(): Promise<Department[]> {
  const rows = await select<DepartmentRow>(
    `SELECT d.*, COUNT(e.id) as member_count
     FROM departments d
     LEFT JOIN employees e ON e.department_id = d.id AND e.is_active = 1
     GROUP BY d.id
     ORDER BY d.name ASC`
  );
  return rows.map(mapRowToDepartment);
}

/**
 * Create a new department
 */
export async function createDepartment(data: CreateDepartmentInput): Promise<Department> {
  const id = randomUUID();
  await execute(
    'INSERT INTO departments (id, name, created_at) VALUES (?, ?, ?)',
    [id, data.name.trim(), new Date().toISOString()]
  );
  const department = await getDepartmentById(id);
  if (!department) {
    throw new Error('Failed to create department');
  }
  return department;
}

/**
 * Delete a department (employees keep their records, department_id becomes NULL)
 */
export async function deleteDepartment(id: string): Promise<void> {
  await execute('DELETE FROM departments WHERE id = ?', [id]);
}

export const departmentRepository = {
  getDepartmentById,
  listDepartments,
  createDepartment,
  deleteDepartment,
};
