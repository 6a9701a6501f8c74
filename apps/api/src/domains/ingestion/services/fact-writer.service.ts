import { VisitStatus } from '@carelytics/shared/constants/ingestion.constants.js';
import type { SelectPatientVisit } from '@carelytics/shared/schemas/db/warehouse.schema.js';
import type { WarehouseRepository } from '../repos/warehouse.repo.js';
import { toMoney, type ResolvedDimensions } from './dimension-resolver.service.js';
import type { NormalizedVisitRow } from './row-validation.service.js';

/**
 * Insert exactly one visit fact. File uploads carry no treatment or
 * medication, so those references stay null.
 */
export async function writeVisitFact(
  repo: WarehouseRepository,
  dims: ResolvedDimensions,
  row: NormalizedVisitRow,
): Promise<SelectPatientVisit> {
  return repo.createPatientVisit({
    patientId: dims.patientId,
    doctorId: dims.doctorId,
    hospitalId: dims.hospitalId,
    diseaseId: dims.diseaseId,
    visitDateId: dims.dateId,
    visitType: row.visit.visitType,
    diagnosis: row.visit.diagnosis,
    treatmentId: null,
    medicationId: null,
    medicationQuantity: null,
    totalCost: toMoney(row.visit.totalCost),
    paymentMethod: row.visit.paymentMethod,
    visitDurationMinutes: row.visit.durationMinutes,
    status: VisitStatus.COMPLETED,
  });
}
