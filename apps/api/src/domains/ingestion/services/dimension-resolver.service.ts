import { DISEASE_DEFAULTS } from '@carelytics/shared/constants/ingestion.constants.js';
import {
  describeCalendarDate,
  toDateId,
  type CalendarDate,
} from '@carelytics/shared/utils/visit-date.utils.js';
import type { WarehouseRepository } from '../repos/warehouse.repo.js';
import type {
  NormalizedDoctor,
  NormalizedHospital,
  NormalizedPatient,
  NormalizedVisitRow,
} from './row-validation.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ResolvedDimensions {
  dateId: number;
  patientId: string;
  hospitalId: string;
  doctorId: string;
  diseaseId: string | null;
}

/** Numeric columns are written as fixed two-decimal strings. */
export function toMoney(value: number): string {
  return value.toFixed(2);
}

// ---------------------------------------------------------------------------
// Find-or-create, one per dimension
// ---------------------------------------------------------------------------

export async function ensureDateDimension(
  repo: WarehouseRepository,
  visitDate: CalendarDate,
): Promise<number> {
  const dateId = toDateId(visitDate);
  const existing = await repo.findDateDimension(dateId);
  if (existing) {
    return existing.dateId;
  }

  const created = await repo.createDateDimension(describeCalendarDate(visitDate));
  return created.dateId;
}

/**
 * Match by phone or email. A patient with neither contact is always
 * created, since NULL contacts never match.
 */
export async function findOrCreatePatient(
  repo: WarehouseRepository,
  patient: NormalizedPatient,
): Promise<string> {
  const existing = await repo.findPatientByContact({
    phone: patient.phone,
    email: patient.email,
  });
  if (existing) {
    return existing.patientId;
  }

  const created = await repo.createPatient({
    patientName: patient.name,
    age: patient.age,
    gender: patient.gender,
    phone: patient.phone,
    email: patient.email,
    address: patient.address,
    city: patient.city,
    state: patient.state,
    pincode: patient.pincode,
  });
  return created.patientId;
}

export async function findOrCreateHospital(
  repo: WarehouseRepository,
  hospital: NormalizedHospital,
): Promise<string> {
  const existing = await repo.findHospitalByNameAndState(
    hospital.name,
    hospital.state,
  );
  if (existing) {
    return existing.hospitalId;
  }

  const created = await repo.createHospital({
    hospitalName: hospital.name,
    hospitalType: hospital.type,
    address: hospital.address,
    city: hospital.city,
    state: hospital.state,
    pincode: hospital.pincode,
    phone: hospital.phone,
    email: hospital.email,
    bedsCount: hospital.bedsCount,
    establishedYear: hospital.establishedYear,
  });
  return created.hospitalId;
}

export async function findOrCreateDoctor(
  repo: WarehouseRepository,
  doctor: NormalizedDoctor,
  hospitalId: string,
): Promise<string> {
  const existing = await repo.findDoctorByNameAndHospital(doctor.name, hospitalId);
  if (existing) {
    return existing.doctorId;
  }

  const created = await repo.createDoctor({
    doctorName: doctor.name,
    specialization: doctor.specialization,
    qualification: doctor.qualification,
    experienceYears: doctor.experienceYears,
    hospitalId,
    phone: doctor.phone,
    email: doctor.email,
    consultationFee: toMoney(doctor.consultationFee),
  });
  return created.doctorId;
}

export async function findOrCreateDisease(
  repo: WarehouseRepository,
  diseaseName: string | null,
): Promise<string | null> {
  if (diseaseName === null) {
    return null;
  }

  const existing = await repo.findDiseaseByName(diseaseName);
  if (existing) {
    return existing.diseaseId;
  }

  const created = await repo.createDisease({
    diseaseName,
    diseaseCategory: DISEASE_DEFAULTS.category,
    severityLevel: DISEASE_DEFAULTS.severityLevel,
    description: `Auto-created during ingestion for ${diseaseName}`,
  });
  return created.diseaseId;
}

// ---------------------------------------------------------------------------
// Resolver
// ---------------------------------------------------------------------------

/**
 * Resolve every dimension a visit references, in order: date, patient,
 * hospital, doctor, disease. Repeated values within a job resolve to the
 * same ids.
 */
export async function resolveDimensions(
  repo: WarehouseRepository,
  row: NormalizedVisitRow,
): Promise<ResolvedDimensions> {
  const dateId = await ensureDateDimension(repo, row.visit.visitDate);
  const patientId = await findOrCreatePatient(repo, row.patient);
  const hospitalId = await findOrCreateHospital(repo, row.hospital);
  const doctorId = await findOrCreateDoctor(repo, row.doctor, hospitalId);
  const diseaseId = await findOrCreateDisease(repo, row.diseaseName);

  return { dateId, patientId, hospitalId, doctorId, diseaseId };
}
