/**
 * Holiday Repository
 * Public holidays are rest days for every employee
 */

import { randomUUID } from 'crypto';
import { execute, select } from '../database';
import type { Holiday, CreateHolidayInput } from '../../types/models';
import type { CountRow } from '../../types/api';

export async function createHoliday(data: CreateHolidayInput): Promise<Holiday> {
  const id = randomUUID();
  const createdAt = new Date().toISOString();
  const name = data.name?.trim() || null;
  await execute('INSERT INTO holidays (id, date, name, created_at) VALUES (?, ?, ?, ?)', [id, data.date, name, createdAt]);
  return { id, date: data.date, name, createdAt };
}

/**
 * True when any holiday falls on the date
 */
export async function isHoliday(date: string): Promise<boolean> {
  const rows = await select<CountRow>('SELECT COUNT(*) as count FROM holidays WHERE date = ?', [date]);
  return (rows[0]?.count ?? 0) > 0;
}

export const holidayRepository = {
  createHoliday,
  isHoliday,
};
