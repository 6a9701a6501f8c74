// ============================================================================
// Healthcare Warehouse: Drizzle DB Schema (dimensions + visit fact)
// ============================================================================

import {
  pgTable,
  uuid,
  varchar,
  boolean,
  timestamp,
  date,
  text,
  integer,
  numeric,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

// --- Patients Dimension ---
// Matched during ingestion by phone or email. Absent contacts are NULL so
// they never match another patient.

export const patients = pgTable(
  'patients',
  {
    patientId: uuid('patient_id').primaryKey().defaultRandom(),
    patientName: varchar('patient_name', { length: 255 }).notNull(),
    age: integer('age').notNull(),
    gender: varchar('gender', { length: 10 }).notNull(),
    phone: varchar('phone', { length: 20 }),
    email: varchar('email', { length: 255 }),
    address: varchar('address', { length: 500 }),
    city: varchar('city', { length: 100 }),
    state: varchar('state', { length: 100 }),
    pincode: varchar('pincode', { length: 10 }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('patients_phone_idx').on(table.phone),
    index('patients_email_idx').on(table.email),
    index('patients_state_idx').on(table.state),
    index('patients_city_idx').on(table.city),
  ],
);

// --- Hospitals Dimension ---
// (hospital_name, state) is the natural key; the unique index turns a
// cross-upload race into a constraint violation instead of a duplicate.

export const hospitals = pgTable(
  'hospitals',
  {
    hospitalId: uuid('hospital_id').primaryKey().defaultRandom(),
    hospitalName: varchar('hospital_name', { length: 255 }).notNull(),
    hospitalType: varchar('hospital_type', { length: 20 }).notNull(),
    address: varchar('address', { length: 500 }),
    city: varchar('city', { length: 100 }),
    state: varchar('state', { length: 100 }).notNull(),
    pincode: varchar('pincode', { length: 10 }),
    phone: varchar('phone', { length: 20 }),
    email: varchar('email', { length: 255 }),
    bedsCount: integer('beds_count'),
    establishedYear: integer('established_year'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('hospitals_name_state_unique_idx').on(
      table.hospitalName,
      table.state,
    ),
    index('hospitals_city_idx').on(table.city),
  ],
);

// --- Doctors Dimension ---

export const doctors = pgTable(
  'doctors',
  {
    doctorId: uuid('doctor_id').primaryKey().defaultRandom(),
    doctorName: varchar('doctor_name', { length: 255 }).notNull(),
    specialization: varchar('specialization', { length: 255 }).notNull(),
    qualification: varchar('qualification', { length: 255 }),
    experienceYears: integer('experience_years'),
    hospitalId: uuid('hospital_id')
      .notNull()
      .references(() => hospitals.hospitalId),
    phone: varchar('phone', { length: 20 }),
    email: varchar('email', { length: 255 }),
    consultationFee: numeric('consultation_fee', { precision: 10, scale: 2 }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('doctors_name_hospital_unique_idx').on(
      table.doctorName,
      table.hospitalId,
    ),
  ],
);

// --- Diseases Dimension ---

export const diseases = pgTable(
  'diseases',
  {
    diseaseId: uuid('disease_id').primaryKey().defaultRandom(),
    diseaseName: varchar('disease_name', { length: 255 }).notNull(),
    diseaseCategory: varchar('disease_category', { length: 100 }),
    severityLevel: varchar('severity_level', { length: 10 }),
    description: text('description'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('diseases_name_unique_idx').on(table.diseaseName),
  ],
);

// --- Treatments / Medications Dimensions ---
// Referenced by the visit fact; file ingestion leaves both references unset.

export const treatments = pgTable('treatments', {
  treatmentId: uuid('treatment_id').primaryKey().defaultRandom(),
  treatmentName: varchar('treatment_name', { length: 255 }).notNull(),
  treatmentType: varchar('treatment_type', { length: 100 }),
  description: text('description'),
  averageCost: numeric('average_cost', { precision: 10, scale: 2 }),
  createdAt: timestamp('created_at', { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export const medications = pgTable('medications', {
  medicationId: uuid('medication_id').primaryKey().defaultRandom(),
  medicationName: varchar('medication_name', { length: 255 }).notNull(),
  manufacturer: varchar('manufacturer', { length: 255 }),
  category: varchar('category', { length: 100 }),
  unitPrice: numeric('unit_price', { precision: 10, scale: 2 }),
  createdAt: timestamp('created_at', { withTimezone: true })
    .notNull()
    .defaultNow(),
});

// --- Date Dimension ---
// date_id is YYYYMMDD, so one row per calendar date is enforced by the PK.

export const dateDimension = pgTable(
  'date_dimension',
  {
    dateId: integer('date_id').primaryKey(),
    fullDate: date('full_date', { mode: 'string' }).notNull(),
    day: integer('day').notNull(),
    month: integer('month').notNull(),
    year: integer('year').notNull(),
    quarter: integer('quarter').notNull(),
    monthName: varchar('month_name', { length: 20 }).notNull(),
    dayName: varchar('day_name', { length: 20 }).notNull(),
    isWeekend: boolean('is_weekend').notNull(),
    isHoliday: boolean('is_holiday').notNull().default(false),
    holidayName: varchar('holiday_name', { length: 100 }),
  },
  (table) => [
    uniqueIndex('date_dimension_full_date_unique_idx').on(table.fullDate),
  ],
);

// --- Patient Visits Fact ---

export const patientVisits = pgTable(
  'patient_visits',
  {
    visitId: uuid('visit_id').primaryKey().defaultRandom(),
    patientId: uuid('patient_id')
      .notNull()
      .references(() => patients.patientId),
    doctorId: uuid('doctor_id')
      .notNull()
      .references(() => doctors.doctorId),
    hospitalId: uuid('hospital_id')
      .notNull()
      .references(() => hospitals.hospitalId),
    diseaseId: uuid('disease_id').references(() => diseases.diseaseId),
    visitDateId: integer('visit_date_id')
      .notNull()
      .references(() => dateDimension.dateId),
    visitType: varchar('visit_type', { length: 20 }).notNull(),
    diagnosis: text('diagnosis'),
    treatmentId: uuid('treatment_id').references(() => treatments.treatmentId),
    medicationId: uuid('medication_id').references(
      () => medications.medicationId,
    ),
    medicationQuantity: integer('medication_quantity'),
    totalCost: numeric('total_cost', { precision: 10, scale: 2 }).notNull(),
    paymentMethod: varchar('payment_method', { length: 20 }).notNull(),
    visitDurationMinutes: integer('visit_duration_minutes'),
    status: varchar('status', { length: 20 }).notNull().default('Completed'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('patient_visits_date_idx').on(table.visitDateId),
    index('patient_visits_patient_idx').on(table.patientId),
    index('patient_visits_hospital_idx').on(table.hospitalId),
    index('patient_visits_disease_idx').on(table.diseaseId),
  ],
);

// --- Inferred Types ---

export type InsertPatient = typeof patients.$inferInsert;
export type SelectPatient = typeof patients.$inferSelect;

export type InsertHospital = typeof hospitals.$inferInsert;
export type SelectHospital = typeof hospitals.$inferSelect;

export type InsertDoctor = typeof doctors.$inferInsert;
export type SelectDoctor = typeof doctors.$inferSelect;

export type InsertDisease = typeof diseases.$inferInsert;
export type SelectDisease = typeof diseases.$inferSelect;

export type InsertDateDimension = typeof dateDimension.$inferInsert;
export type SelectDateDimension = typeof dateDimension.$inferSelect;

export type InsertPatientVisit = typeof patientVisits.$inferInsert;
export type SelectPatientVisit = typeof patientVisits.$inferSelect;
