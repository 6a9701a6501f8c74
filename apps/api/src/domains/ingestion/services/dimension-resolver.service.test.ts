import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  createInMemoryWarehouse,
  type WarehouseStore,
} from '../../../../test/fixtures/ingestion-fakes.js';
import type { WarehouseRepository } from '../repos/warehouse.repo.js';
import {
  resolveDimensions,
  findOrCreatePatient,
  findOrCreateDisease,
  ensureDateDimension,
  toMoney,
} from './dimension-resolver.service.js';
import { writeVisitFact } from './fact-writer.service.js';
import { createVisitRowView, normalizeVisitRow } from './row-validation.service.js';
import type { RawRow } from './tabular-reader.service.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

let repo: WarehouseRepository;
let store: WarehouseStore;

beforeEach(() => {
  ({ repo, store } = createInMemoryWarehouse());
});

function makeRow(overrides: RawRow = {}) {
  return normalizeVisitRow(
    createVisitRowView({
      patient_name: 'Asha Verma',
      age: '45',
      gender: 'Female',
      phone: '+91-9000000001',
      email: 'asha@example.com',
      city: 'Pune',
      state: 'Maharashtra',
      doctor_name: 'Dr. Kiran Rao',
      specialization: 'Cardiology',
      hospital_name: 'City Care Hospital',
      hospital_type: 'Private',
      hospital_state: 'Maharashtra',
      visit_type: 'OPD',
      visit_date: '2024-05-15',
      total_cost: '2500',
      payment_method: 'UPI',
      disease_name: 'Hypertension',
      ...overrides,
    }),
  );
}

// ---------------------------------------------------------------------------
// resolveDimensions
// ---------------------------------------------------------------------------

describe('resolveDimensions', () => {
  it('creates every dimension on first sight', async () => {
    const dims = await resolveDimensions(repo, makeRow());

    expect(dims.dateId).toBe(20240515);
    expect(store.patients).toHaveLength(1);
    expect(store.hospitals).toHaveLength(1);
    expect(store.doctors).toHaveLength(1);
    expect(store.diseases).toHaveLength(1);
    expect(store.dates).toHaveLength(1);

    expect(dims.patientId).toBe(store.patients[0].patientId);
    expect(dims.hospitalId).toBe(store.hospitals[0].hospitalId);
    expect(dims.doctorId).toBe(store.doctors[0].doctorId);
    expect(dims.diseaseId).toBe(store.diseases[0].diseaseId);
  });

  it('reuses existing dimensions for a repeated row', async () => {
    const first = await resolveDimensions(repo, makeRow());
    const second = await resolveDimensions(repo, makeRow());

    expect(second).toEqual(first);
    expect(store.patients).toHaveLength(1);
    expect(store.hospitals).toHaveLength(1);
    expect(store.doctors).toHaveLength(1);
    expect(store.diseases).toHaveLength(1);
    expect(store.dates).toHaveLength(1);
  });

  it('resolves dimensions in date, patient, hospital, doctor, disease order', async () => {
    const calls: string[] = [];
    vi.spyOn(repo, 'findDateDimension').mockImplementation(async () => {
      calls.push('date');
      return undefined;
    });
    vi.spyOn(repo, 'findPatientByContact').mockImplementation(async () => {
      calls.push('patient');
      return undefined;
    });
    vi.spyOn(repo, 'findHospitalByNameAndState').mockImplementation(async () => {
      calls.push('hospital');
      return undefined;
    });
    vi.spyOn(repo, 'findDoctorByNameAndHospital').mockImplementation(async () => {
      calls.push('doctor');
      return undefined;
    });
    vi.spyOn(repo, 'findDiseaseByName').mockImplementation(async () => {
      calls.push('disease');
      return undefined;
    });

    await resolveDimensions(repo, makeRow());

    expect(calls).toEqual(['date', 'patient', 'hospital', 'doctor', 'disease']);
  });

  it('treats the same hospital name in another state as a different hospital', async () => {
    const pune = await resolveDimensions(repo, makeRow());
    const kochi = await resolveDimensions(
      repo,
      makeRow({ hospital_state: 'Kerala', phone: '+91-9000000002', email: '' }),
    );

    expect(kochi.hospitalId).not.toBe(pune.hospitalId);
    expect(kochi.doctorId).not.toBe(pune.doctorId);
    expect(store.hospitals.map((h) => h.state)).toEqual(['Maharashtra', 'Kerala']);
  });

  it('stores the hospital and doctor defaults', async () => {
    await resolveDimensions(repo, makeRow({ hospital_type: '' }));

    expect(store.hospitals[0]).toMatchObject({
      hospitalName: 'City Care Hospital',
      hospitalType: 'Private',
      city: 'Pune',
      state: 'Maharashtra',
      bedsCount: 100,
      establishedYear: 2000,
    });
    expect(store.doctors[0]).toMatchObject({
      doctorName: 'Dr. Kiran Rao',
      specialization: 'Cardiology',
      qualification: 'MBBS',
      experienceYears: 5,
      consultationFee: '500.00',
    });
  });

  it('stores derived calendar attributes on a new date row', async () => {
    await resolveDimensions(repo, makeRow({ visit_date: '18/05/2024' }));

    expect(store.dates[0]).toEqual({
      dateId: 20240518,
      fullDate: '2024-05-18',
      day: 18,
      month: 5,
      year: 2024,
      quarter: 2,
      monthName: 'May',
      dayName: 'Saturday',
      isWeekend: true,
      isHoliday: false,
      holidayName: null,
    });
  });
});

// ---------------------------------------------------------------------------
// Patient matching
// ---------------------------------------------------------------------------

describe('findOrCreatePatient', () => {
  it('matches an existing patient by phone', async () => {
    const first = await findOrCreatePatient(repo, makeRow().patient);
    const second = await findOrCreatePatient(
      repo,
      makeRow({ email: 'different@example.com' }).patient,
    );

    expect(second).toBe(first);
  });

  it('matches an existing patient by email when the phone differs', async () => {
    const first = await findOrCreatePatient(repo, makeRow().patient);
    const second = await findOrCreatePatient(
      repo,
      makeRow({ phone: '+91-9000000099' }).patient,
    );

    expect(second).toBe(first);
  });

  it('always creates a patient that has neither phone nor email', async () => {
    const first = await findOrCreatePatient(repo, makeRow({ phone: '', email: '' }).patient);
    const second = await findOrCreatePatient(repo, makeRow({ phone: '', email: '' }).patient);

    expect(second).not.toBe(first);
    expect(store.patients).toHaveLength(2);
    expect(store.patients[0].phone).toBeNull();
    expect(store.patients[0].email).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Disease and date
// ---------------------------------------------------------------------------

describe('findOrCreateDisease', () => {
  it('returns null without touching storage for a blank disease', async () => {
    const spy = vi.spyOn(repo, 'findDiseaseByName');

    await expect(findOrCreateDisease(repo, null)).resolves.toBeNull();
    expect(spy).not.toHaveBeenCalled();
  });

  it('creates an unknown disease with the ingestion defaults', async () => {
    await findOrCreateDisease(repo, 'Migraine');

    expect(store.diseases[0]).toMatchObject({
      diseaseName: 'Migraine',
      diseaseCategory: 'General',
      severityLevel: 'Medium',
      description: 'Auto-created during ingestion for Migraine',
    });
  });
});

describe('ensureDateDimension', () => {
  it('returns the existing key without inserting again', async () => {
    await ensureDateDimension(repo, { year: 2024, month: 5, day: 15 });
    const create = vi.spyOn(repo, 'createDateDimension');

    const dateId = await ensureDateDimension(repo, { year: 2024, month: 5, day: 15 });

    expect(dateId).toBe(20240515);
    expect(create).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// Fact writer
// ---------------------------------------------------------------------------

describe('writeVisitFact', () => {
  it('inserts one completed visit without treatment or medication', async () => {
    const row = makeRow({ total_cost: '1800.5', diagnosis: 'Routine checkup' });
    const dims = await resolveDimensions(repo, row);

    await writeVisitFact(repo, dims, row);

    expect(store.visits).toHaveLength(1);
    expect(store.visits[0]).toMatchObject({
      patientId: dims.patientId,
      doctorId: dims.doctorId,
      hospitalId: dims.hospitalId,
      diseaseId: dims.diseaseId,
      visitDateId: 20240515,
      visitType: 'OPD',
      diagnosis: 'Routine checkup',
      treatmentId: null,
      medicationId: null,
      medicationQuantity: null,
      totalCost: '1800.50',
      paymentMethod: 'UPI',
      visitDurationMinutes: null,
      status: 'Completed',
    });
  });

  it('writes a new fact every time, even for an identical row', async () => {
    const row = makeRow();
    const dims = await resolveDimensions(repo, row);

    await writeVisitFact(repo, dims, row);
    await writeVisitFact(repo, dims, row);

    expect(store.visits).toHaveLength(2);
  });
});

describe('toMoney', () => {
  it('formats to two decimals', () => {
    expect(toMoney(500)).toBe('500.00');
    expect(toMoney(1800.5)).toBe('1800.50');
  });
});
