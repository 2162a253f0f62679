/**
 * Seed helpers for repository and service tests
 */

import { createEmployee } from '../repositories/employee.repository';
import { createDevice } from '../repositories/device.repository';
import { recordEvent } from '../repositories/access-event.repository';
import type { AccessEventType, CreateEmployeeInput, Device, Employee } from '../../types/models';

let sequence = 0;

export async function seedEmployee(overrides: Partial<CreateEmployeeInput> = {}): Promise<Employee> {
  sequence++;
  return createEmployee({
    employeeCode: `E${sequence.toString().padStart(4, '0')}`,
    fullName: `Test Employee ${sequence}`,
    ...overrides,
  });
}

export async function seedDevice(name = 'Main entrance'): Promise<Device> {
  return createDevice({ name, location: 'Lobby' });
}

/**
 * Record one event and return its id
 */
export async function seedEvent(
  employee: Pick<Employee, 'id'>,
  device: Pick<Device, 'id'>,
  eventType: AccessEventType,
  timestamp: string
): Promise<string> {
  const result = await recordEvent({ employeeId: employee.id, deviceId: device.id, eventType, timestamp });
  return result.id;
}

/**
 * Record an entry and an exit on one day, times as HH:mm
 */
export async function seedWorkInterval(
  employee: Pick<Employee, 'id'>,
  device: Pick<Device, 'id'>,
  date: string,
  from: string,
  to: string
): Promise<void> {
  await seedEvent(employee, device, 'entry', `${date}T${from}:00`);
  await seedEvent(employee, device, 'exit', `${date}T${to}:00`);
}
