/**
 * Database schema. Applied on every connection; all statements are idempotent.
 */

export const SCHEMA = `
-- Organisational units
CREATE TABLE IF NOT EXISTS departments (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Employees tracked by the engine
CREATE TABLE IF NOT EXISTS employees (
    id TEXT PRIMARY KEY,
    employee_code TEXT NOT NULL UNIQUE,
    full_name TEXT NOT NULL,
    department_id TEXT REFERENCES departments(id) ON DELETE SET NULL,
    work_fraction REAL NOT NULL DEFAULT 1.0 CHECK (work_fraction BETWEEN 0.25 AND 2.0),
    daily_hours REAL NOT NULL DEFAULT 8 CHECK (daily_hours BETWEEN 1 AND 24),
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Access-control devices (turnstiles, badge readers)
CREATE TABLE IF NOT EXISTS devices (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    location TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Vacations and business trips
CREATE TABLE IF NOT EXISTS leaves (
    id TEXT PRIMARY KEY,
    employee_id TEXT NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
    kind TEXT NOT NULL CHECK (kind IN ('vacation', 'business_trip')),
    start_date TEXT NOT NULL,
    end_date TEXT NOT NULL,
    status TEXT NOT NULL,
    note TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    CHECK (start_date <= end_date)
);

CREATE TABLE IF NOT EXISTS holidays (
    id TEXT PRIMARY KEY,
    date TEXT NOT NULL UNIQUE,
    name TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Engine settings key-value store (JSON values)
CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Raw access events; rowid doubles as the insertion sequence
CREATE TABLE IF NOT EXISTS access_events (
    id TEXT PRIMARY KEY,
    employee_id TEXT REFERENCES employees(id) ON DELETE SET NULL,
    device_id TEXT NOT NULL REFERENCES devices(id) ON DELETE CASCADE,
    card_number TEXT,
    event_type TEXT NOT NULL CHECK (event_type IN ('entry', 'exit', 'denied', 'alarm')),
    timestamp TEXT NOT NULL,
    event_date TEXT NOT NULL,
    raw_payload TEXT,
    processed INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    UNIQUE(device_id, employee_id, event_type, timestamp)
);

-- Derived work sessions
CREATE TABLE IF NOT EXISTS work_sessions (
    id TEXT PRIMARY KEY,
    employee_id TEXT NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
    date TEXT NOT NULL,
    start_time TEXT NOT NULL,
    end_time TEXT,
    duration_seconds INTEGER NOT NULL DEFAULT 0,
    status TEXT NOT NULL CHECK (status IN ('auto', 'manual', 'open', 'closed_manual')),
    manual_reason TEXT,
    corrected_by TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Events that produced each session
CREATE TABLE IF NOT EXISTS session_events (
    session_id TEXT NOT NULL REFERENCES work_sessions(id) ON DELETE CASCADE,
    event_id TEXT NOT NULL REFERENCES access_events(id) ON DELETE CASCADE,
    PRIMARY KEY (session_id, event_id)
);

-- One summary per employee and day
CREATE TABLE IF NOT EXISTS daily_summaries (
    id TEXT PRIMARY KEY,
    employee_id TEXT NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
    date TEXT NOT NULL,
    first_entry TEXT,
    last_exit TEXT,
    total_seconds INTEGER NOT NULL DEFAULT 0,
    expected_seconds INTEGER NOT NULL DEFAULT 0,
    overtime_seconds INTEGER NOT NULL DEFAULT 0,
    underwork_seconds INTEGER NOT NULL DEFAULT 0,
    sessions_count INTEGER NOT NULL DEFAULT 0,
    status TEXT NOT NULL CHECK (status IN ('present', 'absent', 'excused', 'partial', 'problem')),
    has_missing_exit INTEGER NOT NULL DEFAULT 0,
    has_manual_corrections INTEGER NOT NULL DEFAULT 0,
    flags TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now')),
    UNIQUE(employee_id, date)
);

-- Append-only audit trail
CREATE TABLE IF NOT EXISTS audit_log (
    id TEXT PRIMARY KEY,
    employee_id TEXT REFERENCES employees(id) ON DELETE SET NULL,
    date TEXT,
    action TEXT NOT NULL,
    description TEXT NOT NULL,
    old_value TEXT,
    new_value TEXT,
    reason TEXT,
    changed_by TEXT NOT NULL,
    changed_at TEXT NOT NULL
);

-- Indexes for performance
CREATE INDEX IF NOT EXISTS idx_employees_department ON employees(department_id);
CREATE INDEX IF NOT EXISTS idx_leaves_employee_dates ON leaves(employee_id, start_date, end_date);
CREATE INDEX IF NOT EXISTS idx_access_events_pair ON access_events(employee_id, event_date);
CREATE INDEX IF NOT EXISTS idx_access_events_processed ON access_events(processed, event_date);
CREATE INDEX IF NOT EXISTS idx_access_events_device ON access_events(device_id);
CREATE INDEX IF NOT EXISTS idx_work_sessions_pair ON work_sessions(employee_id, date);
CREATE INDEX IF NOT EXISTS idx_work_sessions_status ON work_sessions(status);
CREATE INDEX IF NOT EXISTS idx_session_events_event ON session_events(event_id);
CREATE INDEX IF NOT EXISTS idx_daily_summaries_date ON daily_summaries(date);
CREATE INDEX IF NOT EXISTS idx_audit_log_changed_at ON audit_log(changed_at);
`;

/**
 * Tables in deletion order (children before parents)
 */
export const TABLES = [
  'audit_log',
  'daily_summaries',
  'session_events',
  'work_sessions',
  'access_events',
  'leaves',
  'holidays',
  'settings',
  'employees',
  'devices',
  'departments',
] as const;
