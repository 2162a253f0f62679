/**
 * Device Repository
 * Access-control devices the events come from
 */

import { randomUUID } from 'crypto';
import { execute, select } from '../database';
import type { Device, CreateDeviceInput } from '../../types';
import type { DeviceRow } from '../../types/api';

function mapRowToDevice(row: DeviceRow): Device {
  return {
    id: row.id,
    name: row.name,
    location: row.location,
    isActive: row.is_active === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Get a device by ID
 */
export async function getDeviceById(id: string): Promise<Device | null> {
  const rows = await select<DeviceRow>('SELECT * FROM devices WHERE id = ?', [id]);
  const row = rows[0];
  return row ? mapRowToDevice(row) : null;
}

/**
 * List all devices
 */
export async function listDevices(): Promise<Device[]> {
  const rows = await select<DeviceRow>('SELECT * FROM devices ORDER BY name ASC');
  return rows.map(mapRowToDevice);
}

/**
 * Register a device
 */
export async function createDevice(data: CreateDeviceInput): Promise<Device> {
  const id = randomUUID();
  const timestamp = new Date().toISOString();
  await execute(
    `INSERT INTO devices (id, name, location, is_active, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?)`,
    [id, data.name, data.location ?? null, data.isActive === false ? 0 : 1, timestamp, timestamp]
  );
  const device = await getDeviceById(id);
  if (!device) {
    throw new Error('Failed to create device');
  }
  return device;
}

export const deviceRepository = {
  getDeviceById,
  listDevices,
  createDevice,
};
