export {
  initTestDatabase,
  closeTestDatabase,
  resetTestDatabase,
  testExecute,
  testSelect,
  countRows,
} from './test-database';

export { seedEmployee, seedDevice, seedEvent, seedWorkInterval } from './fixtures';
