import { readFile } from 'node:fs/promises'
import { URL } from 'node:url'
import pg from 'pg'
import { z } from 'zod'
import { pool } from './pool.js'
import { env } from '../env.js'
import { log } from '../logger.js'

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id serial PRIMARY KEY,
    email text NOT NULL,
    password_hash text NOT NULL,
    first_name text NOT NULL DEFAULT '',
    last_name text NOT NULL DEFAULT '',
    date_of_birth date,
    gender text CHECK (gender IN ('M', 'F', 'O')),
    phone_number text NOT NULL DEFAULT '',
    numerical_identifier text UNIQUE,
    role text CHECK (role IN ('patient', 'clinician', 'administrator')),
    language text NOT NULL DEFAULT 'en' CHECK (language IN ('en', 'es', 'fr', 'ar', 'hi')),
    assigned_doctor_id integer REFERENCES users(id) ON DELETE SET NULL,
    specialty_name text NOT NULL DEFAULT '',
    is_active boolean NOT NULL DEFAULT true,
    is_email_verified boolean NOT NULL DEFAULT false,
    date_joined timestamptz NOT NULL DEFAULT now(),
    last_login timestamptz
  );
  CREATE UNIQUE INDEX IF NOT EXISTS idx_users_email_lower ON users (lower(email));
  CREATE INDEX IF NOT EXISTS idx_users_role ON users (role);
  CREATE INDEX IF NOT EXISTS idx_users_assigned_doctor ON users (assigned_doctor_id);

  CREATE TABLE IF NOT EXISTS email_verifications (
    id uuid PRIMARY KEY,
    user_id integer NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    token text NOT NULL UNIQUE,
    created_at timestamptz NOT NULL DEFAULT now(),
    expires_at timestamptz NOT NULL,
    verified boolean NOT NULL DEFAULT false
  );

  CREATE TABLE IF NOT EXISTS password_resets (
    id uuid PRIMARY KEY,
    user_id integer NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    token text NOT NULL UNIQUE,
    created_at timestamptz NOT NULL DEFAULT now(),
    expires_at timestamptz NOT NULL,
    used boolean NOT NULL DEFAULT false
  );

  CREATE TABLE IF NOT EXISTS login_attempts (
    id uuid PRIMARY KEY,
    email text NOT NULL,
    ip_address text,
    user_agent text NOT NULL DEFAULT '',
    successful boolean NOT NULL,
    attempted_at timestamptz NOT NULL DEFAULT now()
  );
  CREATE INDEX IF NOT EXISTS idx_login_attempts_email_time ON login_attempts (lower(email), attempted_at DESC);

  CREATE TABLE IF NOT EXISTS audit_logs (
    id uuid PRIMARY KEY,
    user_id integer REFERENCES users(id) ON DELETE SET NULL,
    action text NOT NULL CHECK (action IN ('CREATE', 'UPDATE', 'DELETE', 'LOGIN', 'LOGOUT')),
    model_name text NOT NULL,
    object_id text NOT NULL,
    changes jsonb,
    timestamp timestamptz NOT NULL DEFAULT now(),
    ip_address text,
    user_agent text
  );
  CREATE INDEX IF NOT EXISTS idx_audit_logs_model ON audit_logs (model_name);
  CREATE INDEX IF NOT EXISTS idx_audit_logs_action ON audit_logs (action);
  CREATE INDEX IF NOT EXISTS idx_audit_logs_timestamp ON audit_logs (timestamp DESC);
  CREATE INDEX IF NOT EXISTS idx_audit_logs_user ON audit_logs (user_id);
  CREATE INDEX IF NOT EXISTS idx_audit_logs_object ON audit_logs (object_id);

  CREATE TABLE IF NOT EXISTS audit_log_archive (
    id uuid PRIMARY KEY,
    user_id text,
    user_email text,
    action text NOT NULL,
    model_name text NOT NULL,
    object_id text NOT NULL,
    changes jsonb,
    timestamp timestamptz NOT NULL,
    ip_address text,
    user_agent text,
    archived_at timestamptz NOT NULL DEFAULT now()
  );

  CREATE TABLE IF NOT EXISTS cancer_types (
    id serial PRIMARY KEY,
    name text NOT NULL,
    description text NOT NULL DEFAULT '',
    parent_id integer REFERENCES cancer_types(id) ON DELETE CASCADE,
    is_organ boolean NOT NULL DEFAULT false
  );
  CREATE UNIQUE INDEX IF NOT EXISTS idx_cancer_types_name_parent ON cancer_types (name, coalesce(parent_id, 0));

  CREATE TABLE IF NOT EXISTS patient_records (
    id uuid PRIMARY KEY,
    patient_id integer NOT NULL UNIQUE REFERENCES users(id) ON DELETE CASCADE,
    cancer_type_id integer REFERENCES cancer_types(id) ON DELETE SET NULL,
    cancer_stage_text text NOT NULL DEFAULT '',
    diagnosis_date date,
    stage_grouping text NOT NULL DEFAULT '',
    recommended_treatment text NOT NULL DEFAULT '',
    vital_status boolean NOT NULL DEFAULT true,
    notes text NOT NULL DEFAULT '',
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now()
  );

  CREATE TABLE IF NOT EXISTS doctor_assignment_requests (
    id uuid PRIMARY KEY,
    patient_id integer NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    doctor_id integer NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    status text NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'approved', 'rejected')),
    requested_at timestamptz NOT NULL DEFAULT now(),
    processed_at timestamptz,
    processed_by integer REFERENCES users(id) ON DELETE SET NULL,
    notes text NOT NULL DEFAULT ''
  );
  CREATE INDEX IF NOT EXISTS idx_doctor_requests_status ON doctor_assignment_requests (status, requested_at DESC);

  CREATE TABLE IF NOT EXISTS clinician_reviews (
    id uuid PRIMARY KEY,
    patient_record_id uuid NOT NULL REFERENCES patient_records(id) ON DELETE CASCADE,
    clinician_id integer NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    review_date timestamptz NOT NULL DEFAULT now(),
    notes text NOT NULL
  );

  CREATE TABLE IF NOT EXISTS medical_documents (
    id uuid PRIMARY KEY,
    patient_id integer NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    title text NOT NULL,
    document_type text NOT NULL,
    cancer_type_id integer REFERENCES cancer_types(id) ON DELETE SET NULL,
    description text NOT NULL DEFAULT '',
    patient_notes text NOT NULL DEFAULT '',
    file_path text NOT NULL,
    file_name text NOT NULL,
    file_hash text NOT NULL,
    uploaded_by integer REFERENCES users(id) ON DELETE SET NULL,
    uploaded_at timestamptz NOT NULL DEFAULT now()
  );
  CREATE INDEX IF NOT EXISTS idx_medical_documents_patient ON medical_documents (patient_id, uploaded_at DESC);

  CREATE TABLE IF NOT EXISTS patient_feedback (
    id uuid PRIMARY KEY,
    patient_id integer NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    rating integer NOT NULL CHECK (rating BETWEEN 1 AND 5),
    comments text NOT NULL DEFAULT '',
    submitted_at timestamptz NOT NULL DEFAULT now()
  );

  CREATE TABLE IF NOT EXISTS chat_documents (
    id uuid PRIMARY KEY,
    title text NOT NULL,
    description text NOT NULL DEFAULT '',
    document_type text NOT NULL,
    file_path text NOT NULL,
    file_name text NOT NULL,
    cancer_type_id integer REFERENCES cancer_types(id) ON DELETE SET NULL,
    indexed boolean NOT NULL DEFAULT false,
    indexed_at timestamptz,
    file_hash text,
    uploaded_by integer REFERENCES users(id) ON DELETE SET NULL,
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now()
  );
  CREATE INDEX IF NOT EXISTS idx_chat_documents_hash ON chat_documents (file_hash);

  CREATE TABLE IF NOT EXISTS chat_document_chunks (
    id uuid PRIMARY KEY,
    document_id uuid NOT NULL REFERENCES chat_documents(id) ON DELETE CASCADE,
    chunk_index integer NOT NULL,
    content text NOT NULL,
    metadata jsonb NOT NULL DEFAULT '{}'::jsonb,
    embedding double precision[],
    UNIQUE (document_id, chunk_index)
  );

  CREATE TABLE IF NOT EXISTS chat_sessions (
    id uuid PRIMARY KEY,
    user_id integer NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    title text NOT NULL,
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now(),
    active boolean NOT NULL DEFAULT true
  );
  CREATE INDEX IF NOT EXISTS idx_chat_sessions_user_updated ON chat_sessions (user_id, updated_at DESC);

  CREATE TABLE IF NOT EXISTS chat_messages (
    id uuid PRIMARY KEY,
    session_id uuid NOT NULL REFERENCES chat_sessions(id) ON DELETE CASCADE,
    role text NOT NULL CHECK (role IN ('user', 'assistant', 'system')),
    content text NOT NULL,
    created_at timestamptz NOT NULL DEFAULT now()
  );
  CREATE INDEX IF NOT EXISTS idx_chat_messages_session_created ON chat_messages (session_id, created_at, id);

  CREATE TABLE IF NOT EXISTS chat_feedback (
    id uuid PRIMARY KEY,
    message_id uuid NOT NULL UNIQUE REFERENCES chat_messages(id) ON DELETE CASCADE,
    helpful boolean NOT NULL,
    comment text NOT NULL DEFAULT '',
    created_at timestamptz NOT NULL DEFAULT now()
  );
`

const seedSchema = z.array(
  z.object({
    name: z.string().min(1),
    description: z.string().default(''),
    subtypes: z.array(z.string().min(1)).default([])
  })
)

async function loadCancerTypeSeed() {
  const raw = await readFile(new URL('./cancerTypes.json', import.meta.url), 'utf8')
  return seedSchema.parse(JSON.parse(raw))
}

/**
 * Insert the organ-level cancer types (and their subtypes) on a fresh database.
 */
async function seedCancerTypes() {
  const { rows } = await pool.query<{ count: string }>('SELECT count(*)::text AS count FROM cancer_types')
  if (Number(rows[0]?.count ?? '0') > 0) return

  const organs = await loadCancerTypeSeed()
  for (const organ of organs) {
    const inserted = await pool.query<{ id: number }>(
      'INSERT INTO cancer_types (name, description, is_organ) VALUES ($1, $2, true) RETURNING id',
      [organ.name, organ.description]
    )
    const parentId = inserted.rows[0]?.id
    for (const subtype of organ.subtypes) {
      await pool.query('INSERT INTO cancer_types (name, parent_id, is_organ) VALUES ($1, $2, false)', [subtype, parentId])
    }
  }
  log('info', 'db.seeded', { table: 'cancer_types', organs: organs.length })
}

function isMissingDatabase(err: unknown) {
  // Postgres error code 3D000 = invalid_catalog_name (DB does not exist)
  return typeof err === 'object' && err !== null && 'code' in err && err.code === '3D000'
}

/**
 * Create tables and indexes if they don't already exist, then seed reference data.
 *
 * This runs at server startup so a fresh checkout needs no separate migration step.
 */
export async function initDb() {
  async function ensureDatabaseExists() {
    try {
      const url = new URL(env.DATABASE_URL)
      const targetDb = url.pathname.replace(/^\//, '')
      if (!targetDb) return

      // Connect to maintenance DB (postgres) on same host/port/user
      url.pathname = '/postgres'
      const client = new pg.Client({ connectionString: url.toString() })
      await client.connect()
      try {
        const { rows } = await client.query('SELECT 1 FROM pg_database WHERE datname = $1', [targetDb])
        if (rows.length === 0) {
          const ident = '"' + targetDb.replace(/"/g, '""') + '"'
          await client.query(`CREATE DATABASE ${ident}`)
          log('info', 'db.created', { database: targetDb })
        }
      } finally {
        await client.end()
      }
    } catch (err) {
      log('warn', 'db.ensure_database_failed', { error: String(err) })
    }
  }

  try {
    await pool.query(SCHEMA)
  } catch (err) {
    if (!isMissingDatabase(err)) throw err
    log('warn', 'db.missing', { message: 'Database does not exist, attempting to create.' })
    await ensureDatabaseExists()
    // retry once
    await pool.query(SCHEMA)
  }

  await seedCancerTypes()
}
