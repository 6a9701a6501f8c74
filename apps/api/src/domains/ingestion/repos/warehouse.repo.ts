import { eq, and, or } from 'drizzle-orm';
import {
  patients,
  hospitals,
  doctors,
  diseases,
  dateDimension,
  patientVisits,
  type InsertPatient,
  type SelectPatient,
  type InsertHospital,
  type SelectHospital,
  type InsertDoctor,
  type SelectDoctor,
  type InsertDisease,
  type SelectDisease,
  type InsertDateDimension,
  type SelectDateDimension,
  type InsertPatientVisit,
  type SelectPatientVisit,
} from '@carelytics/shared/schemas/db/warehouse.schema.js';
import type { WarehouseDb } from '../../../lib/db.js';

// ---------------------------------------------------------------------------
// Warehouse Repository (dimension lookups/inserts + visit fact inserts)
// ---------------------------------------------------------------------------

export interface PatientContact {
  phone: string | null;
  email: string | null;
}

export interface WarehouseRepository {
  findPatientByContact(contact: PatientContact): Promise<SelectPatient | undefined>;
  createPatient(data: InsertPatient): Promise<SelectPatient>;

  findHospitalByNameAndState(
    hospitalName: string,
    state: string,
  ): Promise<SelectHospital | undefined>;
  createHospital(data: InsertHospital): Promise<SelectHospital>;

  findDoctorByNameAndHospital(
    doctorName: string,
    hospitalId: string,
  ): Promise<SelectDoctor | undefined>;
  createDoctor(data: InsertDoctor): Promise<SelectDoctor>;

  findDiseaseByName(diseaseName: string): Promise<SelectDisease | undefined>;
  createDisease(data: InsertDisease): Promise<SelectDisease>;

  findDateDimension(dateId: number): Promise<SelectDateDimension | undefined>;
  createDateDimension(data: InsertDateDimension): Promise<SelectDateDimension>;

  createPatientVisit(data: InsertPatientVisit): Promise<SelectPatientVisit>;

  /**
   * Run `fn` inside one database transaction. The repository handed to `fn`
   * is bound to that transaction; a thrown error rolls everything back.
   */
  transaction<T>(fn: (tx: WarehouseRepository) => Promise<T>): Promise<T>;
}

export function createWarehouseRepository(db: WarehouseDb): WarehouseRepository {
  return {
    /**
     * Match on phone or email, whichever is present. NULL contacts never
     * match, so a patient without either is never looked up.
     */
    async findPatientByContact(
      contact: PatientContact,
    ): Promise<SelectPatient | undefined> {
      if (contact.phone == null && contact.email == null) {
        return undefined;
      }

      const rows = await db
        .select()
        .from(patients)
        .where(
          or(
            contact.phone != null ? eq(patients.phone, contact.phone) : undefined,
            contact.email != null ? eq(patients.email, contact.email) : undefined,
          ),
        )
        .limit(1);
      return rows[0];
    },

    async createPatient(data: InsertPatient): Promise<SelectPatient> {
      const rows = await db.insert(patients).values(data).returning();
      return rows[0];
    },

    async findHospitalByNameAndState(
      hospitalName: string,
      state: string,
    ): Promise<SelectHospital | undefined> {
      const rows = await db
        .select()
        .from(hospitals)
        .where(
          and(
            eq(hospitals.hospitalName, hospitalName),
            eq(hospitals.state, state),
          ),
        )
        .limit(1);
      return rows[0];
    },

    async createHospital(data: InsertHospital): Promise<SelectHospital> {
      const rows = await db.insert(hospitals).values(data).returning();
      return rows[0];
    },

    async findDoctorByNameAndHospital(
      doctorName: string,
      hospitalId: string,
    ): Promise<SelectDoctor | undefined> {
      const rows = await db
        .select()
        .from(doctors)
        .where(
          and(
            eq(doctors.doctorName, doctorName),
            eq(doctors.hospitalId, hospitalId),
          ),
        )
        .limit(1);
      return rows[0];
    },

    async createDoctor(data: InsertDoctor): Promise<SelectDoctor> {
      const rows = await db.insert(doctors).values(data).returning();
      return rows[0];
    },

    async findDiseaseByName(
      diseaseName: string,
    ): Promise<SelectDisease | undefined> {
      const rows = await db
        .select()
        .from(diseases)
        .where(eq(diseases.diseaseName, diseaseName))
        .limit(1);
      return rows[0];
    },

    async createDisease(data: InsertDisease): Promise<SelectDisease> {
      const rows = await db.insert(diseases).values(data).returning();
      return rows[0];
    },

    async findDateDimension(
      dateId: number,
    ): Promise<SelectDateDimension | undefined> {
      const rows = await db
        .select()
        .from(dateDimension)
        .where(eq(dateDimension.dateId, dateId))
        .limit(1);
      return rows[0];
    },

    async createDateDimension(
      data: InsertDateDimension,
    ): Promise<SelectDateDimension> {
      const rows = await db.insert(dateDimension).values(data).returning();
      return rows[0];
    },

    /**
     * Insert one visit fact. There is no update path: re-ingesting the same
     * visit produces another row.
     */
    async createPatientVisit(
      data: InsertPatientVisit,
    ): Promise<SelectPatientVisit> {
      const rows = await db.insert(patientVisits).values(data).returning();
      return rows[0];
    },

    async transaction<T>(
      fn: (tx: WarehouseRepository) => Promise<T>,
    ): Promise<T> {
      return db.transaction(async (tx) => fn(createWarehouseRepository(tx)));
    },
  };
}
