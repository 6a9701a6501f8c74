import { describe, it, expect } from 'vitest';
import { RowValidationError, SchemaError } from '../../../lib/errors.js';
import {
  createVisitRowView,
  normalizeVisitRow,
  validateColumns,
} from './row-validation.service.js';
import type { RawRow } from './tabular-reader.service.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function makeRow(overrides: RawRow = {}): RawRow {
  return {
    patient_name: 'Asha Verma',
    age: '45',
    gender: 'female',
    city: 'Pune',
    state: 'Maharashtra',
    doctor_name: 'Dr. Kiran Rao',
    specialization: 'Cardiology',
    hospital_name: 'City Care Hospital',
    hospital_type: 'private',
    hospital_state: 'Maharashtra',
    visit_type: 'opd',
    visit_date: '2024-05-15',
    total_cost: '2500',
    payment_method: 'upi',
    ...overrides,
  };
}

function normalize(overrides: RawRow = {}) {
  return normalizeVisitRow(createVisitRowView(makeRow(overrides)));
}

function rejectionOf(overrides: RawRow): RowValidationError {
  try {
    normalize(overrides);
  } catch (err) {
    if (err instanceof RowValidationError) return err;
    throw err;
  }
  throw new Error('expected the row to be rejected');
}

// ---------------------------------------------------------------------------
// validateColumns
// ---------------------------------------------------------------------------

describe('validateColumns', () => {
  it('accepts the required columns in any order, with extras', () => {
    const columns = Object.keys(makeRow()).reverse().concat(['notes', 'phone']);
    expect(() => validateColumns(columns)).not.toThrow();
  });

  it('lists every missing column in required order', () => {
    const columns = Object.keys(makeRow()).filter(
      (c) => c !== 'total_cost' && c !== 'hospital_name' && c !== 'age',
    );

    try {
      validateColumns(columns);
      expect.unreachable('validateColumns should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaError);
      if (!(err instanceof SchemaError)) return;
      expect(err.missingColumns).toEqual(['age', 'hospital_name', 'total_cost']);
      expect(err.message).toBe('Missing required columns: age, hospital_name, total_cost');
      expect(err.statusCode).toBe(400);
      expect(err.details).toEqual({ missingColumns: ['age', 'hospital_name', 'total_cost'] });
    }
  });

  it('reports every required column for an empty header', () => {
    expect(() => validateColumns([])).toThrow(
      'Missing required columns: patient_name, age, gender, city, state, doctor_name, ' +
        'specialization, hospital_name, hospital_type, hospital_state, visit_type, ' +
        'visit_date, total_cost, payment_method',
    );
  });
});

// ---------------------------------------------------------------------------
// createVisitRowView
// ---------------------------------------------------------------------------

describe('createVisitRowView', () => {
  it('trims text and stringifies non-string cells', () => {
    const view = createVisitRowView(makeRow({ patient_name: '  Asha Verma ', age: 45 }));

    expect(view.text('patient_name')).toBe('Asha Verma');
    expect(view.text('age')).toBe('45');
  });

  it('reads null required cells as empty text', () => {
    const view = createVisitRowView(makeRow({ city: null }));
    expect(view.text('city')).toBe('');
  });

  it('returns null for absent or blank optional cells', () => {
    const view = createVisitRowView(makeRow({ email: '   ', phone: '9000000001' }));

    expect(view.optionalText('email')).toBeNull();
    expect(view.optionalText('pincode')).toBeNull();
    expect(view.optionalText('phone')).toBe('9000000001');
  });
});

// ---------------------------------------------------------------------------
// normalizeVisitRow: canonical values and defaults
// ---------------------------------------------------------------------------

describe('normalizeVisitRow', () => {
  it('canonicalizes enumerations regardless of case', () => {
    const row = normalize({
      gender: 'MALE',
      visit_type: 'FOLLOW-UP',
      payment_method: 'Insurance',
      hospital_type: 'government',
    });

    expect(row.patient.gender).toBe('Male');
    expect(row.visit.visitType).toBe('Follow-up');
    expect(row.visit.paymentMethod).toBe('Insurance');
    expect(row.hospital.type).toBe('Government');
  });

  it('parses cost, age and visit date', () => {
    const row = normalize({ total_cost: ' 1800.50 ', age: '7', visit_date: '15/05/2024' });

    expect(row.visit.totalCost).toBe(1800.5);
    expect(row.patient.age).toBe(7);
    expect(row.visit.visitDate).toEqual({ year: 2024, month: 5, day: 15 });
  });

  it('applies hospital and doctor defaults when optional columns are absent', () => {
    const row = normalize({ address: '12 Lake Road', pincode: '411001', hospital_type: '' });

    expect(row.hospital).toEqual({
      name: 'City Care Hospital',
      type: 'Private',
      address: '12 Lake Road',
      city: 'Pune',
      state: 'Maharashtra',
      pincode: '411001',
      phone: null,
      email: null,
      bedsCount: 100,
      establishedYear: 2000,
    });
    expect(row.doctor).toEqual({
      name: 'Dr. Kiran Rao',
      specialization: 'Cardiology',
      qualification: 'MBBS',
      experienceYears: 5,
      phone: null,
      email: null,
      consultationFee: 500,
    });
  });

  it('falls back to the patient state when hospital_state is blank', () => {
    const row = normalize({ hospital_state: ' ', state: 'Kerala' });
    expect(row.hospital.state).toBe('Kerala');
  });

  it('defaults a blank specialization to General Medicine', () => {
    const row = normalize({ specialization: '' });
    expect(row.doctor.specialization).toBe('General Medicine');
  });

  it('prefers hospital location columns over the patient address', () => {
    const row = normalize({
      address: '12 Lake Road',
      hospital_address: '1 Hospital Lane',
      hospital_city: 'Mumbai',
      hospital_pincode: '400001',
    });

    expect(row.hospital.address).toBe('1 Hospital Lane');
    expect(row.hospital.city).toBe('Mumbai');
    expect(row.hospital.pincode).toBe('400001');
  });

  it('keeps optional numeric columns when present', () => {
    const row = normalize({
      experience_years: '12',
      consultation_fee: '750.25',
      beds_count: '250',
      established_year: '1985',
      visit_duration_minutes: '30',
    });

    expect(row.doctor.experienceYears).toBe(12);
    expect(row.doctor.consultationFee).toBe(750.25);
    expect(row.hospital.bedsCount).toBe(250);
    expect(row.hospital.establishedYear).toBe(1985);
    expect(row.visit.durationMinutes).toBe(30);
  });

  it('stores blank contacts, disease and diagnosis as null', () => {
    const row = normalize({ phone: '', email: ' ', disease_name: '', diagnosis: '' });

    expect(row.patient.phone).toBeNull();
    expect(row.patient.email).toBeNull();
    expect(row.diseaseName).toBeNull();
    expect(row.visit.diagnosis).toBeNull();
    expect(row.visit.durationMinutes).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// normalizeVisitRow: rejections
// ---------------------------------------------------------------------------

describe('normalizeVisitRow rejections', () => {
  it('rejects an unknown gender', () => {
    const err = rejectionOf({ gender: 'unknown' });
    expect(err.message).toBe('Invalid gender; must be Male, Female, or Other');
    expect(err.column).toBe('gender');
  });

  it('rejects a blank gender', () => {
    expect(rejectionOf({ gender: '' }).message).toBe(
      'Invalid gender; must be Male, Female, or Other',
    );
  });

  it('rejects an unknown visit type', () => {
    expect(rejectionOf({ visit_type: 'walk-in' }).message).toBe(
      'Invalid visit_type; must be OPD/Emergency/IPD/Follow-up',
    );
  });

  it('rejects an unknown payment method', () => {
    expect(rejectionOf({ payment_method: 'cheque' }).message).toBe(
      'Invalid payment_method; must be Cash/Insurance/Card/UPI',
    );
  });

  it('requires total_cost', () => {
    expect(rejectionOf({ total_cost: '' }).message).toBe('total_cost is required');
    expect(rejectionOf({ total_cost: null }).message).toBe('total_cost is required');
  });

  it('rejects a non-numeric total_cost', () => {
    expect(rejectionOf({ total_cost: 'abc' }).message).toBe('Invalid total_cost: abc');
  });

  it('rejects an invalid visit date', () => {
    expect(rejectionOf({ visit_date: '15-13-2024' }).message).toBe(
      'Invalid visit_date: 15-13-2024',
    );
  });

  it('rejects a negative or fractional age', () => {
    expect(rejectionOf({ age: '-3' }).message).toBe('Invalid age: -3');
    expect(rejectionOf({ age: '4.5' }).message).toBe('Invalid age: 4.5');
  });

  it('rejects an unknown hospital type', () => {
    expect(rejectionOf({ hospital_type: 'military' }).message).toBe(
      'Invalid hospital_type; must be Government/Private/Charity',
    );
  });

  it('rejects unparseable optional numerics', () => {
    expect(rejectionOf({ beds_count: 'many' }).message).toBe('Invalid beds_count: many');
    expect(rejectionOf({ consultation_fee: 'free' }).message).toBe(
      'Invalid consultation_fee: free',
    );
  });

  it('reports the first failing rule only', () => {
    const err = rejectionOf({
      gender: 'x',
      visit_type: 'x',
      total_cost: '',
      visit_date: 'x',
    });
    expect(err.column).toBe('gender');
  });

  it('checks payment method before total_cost', () => {
    expect(rejectionOf({ payment_method: 'barter', total_cost: '' }).column).toBe(
      'payment_method',
    );
  });
});
