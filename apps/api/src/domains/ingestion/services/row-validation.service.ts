import {
  REQUIRED_COLUMNS,
  GENDER_CANONICAL,
  VISIT_TYPE_CANONICAL,
  PAYMENT_METHOD_CANONICAL,
  HOSPITAL_TYPE_CANONICAL,
  HOSPITAL_DEFAULTS,
  DOCTOR_DEFAULTS,
  type RequiredColumn,
  type OptionalColumn,
  type Gender,
  type VisitType,
  type PaymentMethod,
  type HospitalType,
} from '@carelytics/shared/constants/ingestion.constants.js';
import {
  parseVisitDate,
  type CalendarDate,
} from '@carelytics/shared/utils/visit-date.utils.js';
import { RowValidationError, SchemaError } from '../../../lib/errors.js';
import type { RawCell, RawRow } from './tabular-reader.service.js';

// ---------------------------------------------------------------------------
// Schema validation
// ---------------------------------------------------------------------------

/**
 * Throws SchemaError listing every missing required column, in the order
 * they are declared. Extra columns are ignored.
 */
export function validateColumns(columns: readonly string[]): void {
  const present = new Set(columns);
  const missing = REQUIRED_COLUMNS.filter((column) => !present.has(column));
  if (missing.length > 0) {
    throw new SchemaError(missing);
  }
}

// ---------------------------------------------------------------------------
// Typed row view
// ---------------------------------------------------------------------------

/**
 * Read access to one raw row once its header has passed
 * {@link validateColumns}. Values are trimmed text; nothing is coerced.
 */
export interface VisitRowView {
  /** Trimmed text of a required column; blank cells read as ''. */
  text(column: RequiredColumn): string;
  /** Trimmed text of an optional column, or null when absent or blank. */
  optionalText(column: OptionalColumn): string | null;
}

function cellText(cell: RawCell | undefined): string {
  if (cell == null) return '';
  return String(cell).trim();
}

export function createVisitRowView(row: RawRow): VisitRowView {
  return {
    text: (column) => cellText(row[column]),
    optionalText: (column) => {
      const value = cellText(row[column]);
      return value === '' ? null : value;
    },
  };
}

// ---------------------------------------------------------------------------
// Normalized row
// ---------------------------------------------------------------------------

export interface NormalizedPatient {
  name: string;
  age: number;
  gender: Gender;
  phone: string | null;
  email: string | null;
  address: string | null;
  city: string;
  state: string;
  pincode: string | null;
}

export interface NormalizedHospital {
  name: string;
  type: HospitalType;
  address: string | null;
  city: string;
  state: string;
  pincode: string | null;
  phone: string | null;
  email: string | null;
  bedsCount: number;
  establishedYear: number;
}

export interface NormalizedDoctor {
  name: string;
  specialization: string;
  qualification: string;
  experienceYears: number;
  phone: string | null;
  email: string | null;
  consultationFee: number;
}

export interface NormalizedVisit {
  visitDate: CalendarDate;
  visitType: VisitType;
  paymentMethod: PaymentMethod;
  totalCost: number;
  diagnosis: string | null;
  durationMinutes: number | null;
}

export interface NormalizedVisitRow {
  patient: NormalizedPatient;
  hospital: NormalizedHospital;
  doctor: NormalizedDoctor;
  /** Null when the row names no disease. */
  diseaseName: string | null;
  visit: NormalizedVisit;
}

// ---------------------------------------------------------------------------
// Field parsers
// ---------------------------------------------------------------------------

function canonical<T extends string>(
  vocabulary: Readonly<Record<string, T>>,
  value: string,
): T | undefined {
  if (value === '') return undefined;
  const key = value.toLowerCase();
  return Object.prototype.hasOwnProperty.call(vocabulary, key)
    ? vocabulary[key]
    : undefined;
}

function parseNonNegativeInteger(value: string): number | undefined {
  if (value === '') return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

function parseFiniteNumber(value: string): number | undefined {
  if (value === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function optionalInteger(view: VisitRowView, column: OptionalColumn): number | null {
  const raw = view.optionalText(column);
  if (raw === null) return null;
  const parsed = parseNonNegativeInteger(raw);
  if (parsed === undefined) {
    throw new RowValidationError(`Invalid ${column}: ${raw}`, column);
  }
  return parsed;
}

function optionalNumber(view: VisitRowView, column: OptionalColumn): number | null {
  const raw = view.optionalText(column);
  if (raw === null) return null;
  const parsed = parseFiniteNumber(raw);
  if (parsed === undefined) {
    throw new RowValidationError(`Invalid ${column}: ${raw}`, column);
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Normalizer
// ---------------------------------------------------------------------------

/**
 * Validate and canonicalize one row. Checks run in a fixed order and the
 * first failure is thrown as a RowValidationError.
 */
export function normalizeVisitRow(view: VisitRowView): NormalizedVisitRow {
  const gender = canonical(GENDER_CANONICAL, view.text('gender'));
  if (!gender) {
    throw new RowValidationError(
      'Invalid gender; must be Male, Female, or Other',
      'gender',
    );
  }

  const visitType = canonical(VISIT_TYPE_CANONICAL, view.text('visit_type'));
  if (!visitType) {
    throw new RowValidationError(
      'Invalid visit_type; must be OPD/Emergency/IPD/Follow-up',
      'visit_type',
    );
  }

  const paymentMethod = canonical(
    PAYMENT_METHOD_CANONICAL,
    view.text('payment_method'),
  );
  if (!paymentMethod) {
    throw new RowValidationError(
      'Invalid payment_method; must be Cash/Insurance/Card/UPI',
      'payment_method',
    );
  }

  const rawCost = view.text('total_cost');
  if (rawCost === '') {
    throw new RowValidationError('total_cost is required', 'total_cost');
  }
  const totalCost = parseFiniteNumber(rawCost);
  if (totalCost === undefined) {
    throw new RowValidationError(`Invalid total_cost: ${rawCost}`, 'total_cost');
  }

  const rawDate = view.text('visit_date');
  const visitDate = parseVisitDate(rawDate);
  if (!visitDate) {
    throw new RowValidationError(`Invalid visit_date: ${rawDate}`, 'visit_date');
  }

  const rawAge = view.text('age');
  const age = parseNonNegativeInteger(rawAge);
  if (age === undefined) {
    throw new RowValidationError(`Invalid age: ${rawAge}`, 'age');
  }

  const rawHospitalType = view.text('hospital_type');
  const hospitalType =
    rawHospitalType === ''
      ? HOSPITAL_DEFAULTS.hospitalType
      : canonical(HOSPITAL_TYPE_CANONICAL, rawHospitalType);
  if (!hospitalType) {
    throw new RowValidationError(
      'Invalid hospital_type; must be Government/Private/Charity',
      'hospital_type',
    );
  }

  const experienceYears = optionalInteger(view, 'experience_years');
  const consultationFee = optionalNumber(view, 'consultation_fee');
  const bedsCount = optionalInteger(view, 'beds_count');
  const establishedYear = optionalInteger(view, 'established_year');
  const durationMinutes = optionalInteger(view, 'visit_duration_minutes');

  const patient: NormalizedPatient = {
    name: view.text('patient_name'),
    age,
    gender,
    phone: view.optionalText('phone'),
    email: view.optionalText('email'),
    address: view.optionalText('address'),
    city: view.text('city'),
    state: view.text('state'),
    pincode: view.optionalText('pincode'),
  };

  // Hospital location falls back to the patient's when not given.
  const hospital: NormalizedHospital = {
    name: view.text('hospital_name'),
    type: hospitalType,
    address: view.optionalText('hospital_address') ?? patient.address,
    city: view.optionalText('hospital_city') ?? patient.city,
    state: view.text('hospital_state') || patient.state,
    pincode: view.optionalText('hospital_pincode') ?? patient.pincode,
    phone: view.optionalText('hospital_phone'),
    email: view.optionalText('hospital_email'),
    bedsCount: bedsCount ?? HOSPITAL_DEFAULTS.bedsCount,
    establishedYear: establishedYear ?? HOSPITAL_DEFAULTS.establishedYear,
  };

  const doctor: NormalizedDoctor = {
    name: view.text('doctor_name'),
    specialization: view.text('specialization') || DOCTOR_DEFAULTS.specialization,
    qualification: view.optionalText('qualification') ?? DOCTOR_DEFAULTS.qualification,
    experienceYears: experienceYears ?? DOCTOR_DEFAULTS.experienceYears,
    phone: view.optionalText('doctor_phone'),
    email: view.optionalText('doctor_email'),
    consultationFee: consultationFee ?? DOCTOR_DEFAULTS.consultationFee,
  };

  return {
    patient,
    hospital,
    doctor,
    diseaseName: view.optionalText('disease_name'),
    visit: {
      visitDate,
      visitType,
      paymentMethod,
      totalCost,
      diagnosis: view.optionalText('diagnosis'),
      durationMinutes,
    },
  };
}
