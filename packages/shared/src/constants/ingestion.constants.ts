// ============================================================================
// Patient-Visit Ingestion: Constants
// ============================================================================

// --- Job Type ---

export const IngestionJobType = {
  PATIENT_VISITS: 'PATIENT_VISITS',
} as const;

export type IngestionJobType =
  (typeof IngestionJobType)[keyof typeof IngestionJobType];

// --- Job Status ---

export const JobStatus = {
  PROCESSING: 'PROCESSING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
} as const;

export type JobStatus = (typeof JobStatus)[keyof typeof JobStatus];

// --- Staging Row Status ---

export const StagingStatus = {
  PENDING: 'PENDING',
  PROCESSED: 'PROCESSED',
  FAILED: 'FAILED',
} as const;

export type StagingStatus = (typeof StagingStatus)[keyof typeof StagingStatus];

// --- Tabular Formats ---

export const TabularFormat = {
  CSV: 'csv',
  XLSX: 'xlsx',
  XLS: 'xls',
} as const;

export type TabularFormat = (typeof TabularFormat)[keyof typeof TabularFormat];

// --- Upload Columns ---
// Exact header names. Required columns are checked before any row is read;
// optional columns are read when present.

export const REQUIRED_COLUMNS = [
  'patient_name',
  'age',
  'gender',
  'city',
  'state',
  'doctor_name',
  'specialization',
  'hospital_name',
  'hospital_type',
  'hospital_state',
  'visit_type',
  'visit_date',
  'total_cost',
  'payment_method',
] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

export const OPTIONAL_COLUMNS = [
  'phone',
  'email',
  'address',
  'pincode',
  'hospital_address',
  'hospital_city',
  'hospital_pincode',
  'hospital_phone',
  'hospital_email',
  'qualification',
  'experience_years',
  'consultation_fee',
  'doctor_phone',
  'doctor_email',
  'disease_name',
  'diagnosis',
  'visit_duration_minutes',
  'beds_count',
  'established_year',
] as const;

export type OptionalColumn = (typeof OPTIONAL_COLUMNS)[number];

export type VisitColumn = RequiredColumn | OptionalColumn;

// --- Controlled Vocabularies ---
// Keys are the lower-cased accepted input, values the stored display form.

export const Gender = {
  MALE: 'Male',
  FEMALE: 'Female',
  OTHER: 'Other',
} as const;

export type Gender = (typeof Gender)[keyof typeof Gender];

export const GENDER_CANONICAL: Readonly<Record<string, Gender>> = Object.freeze({
  male: Gender.MALE,
  female: Gender.FEMALE,
  other: Gender.OTHER,
});

export const VisitType = {
  OPD: 'OPD',
  EMERGENCY: 'Emergency',
  IPD: 'IPD',
  FOLLOW_UP: 'Follow-up',
} as const;

export type VisitType = (typeof VisitType)[keyof typeof VisitType];

export const VISIT_TYPE_CANONICAL: Readonly<Record<string, VisitType>> = Object.freeze({
  opd: VisitType.OPD,
  emergency: VisitType.EMERGENCY,
  ipd: VisitType.IPD,
  'follow-up': VisitType.FOLLOW_UP,
});

export const PaymentMethod = {
  CASH: 'Cash',
  INSURANCE: 'Insurance',
  CARD: 'Card',
  UPI: 'UPI',
} as const;

export type PaymentMethod = (typeof PaymentMethod)[keyof typeof PaymentMethod];

export const PAYMENT_METHOD_CANONICAL: Readonly<Record<string, PaymentMethod>> =
  Object.freeze({
    cash: PaymentMethod.CASH,
    insurance: PaymentMethod.INSURANCE,
    card: PaymentMethod.CARD,
    upi: PaymentMethod.UPI,
  });

export const HospitalType = {
  GOVERNMENT: 'Government',
  PRIVATE: 'Private',
  CHARITY: 'Charity',
} as const;

export type HospitalType = (typeof HospitalType)[keyof typeof HospitalType];

export const HOSPITAL_TYPE_CANONICAL: Readonly<Record<string, HospitalType>> =
  Object.freeze({
    government: HospitalType.GOVERNMENT,
    private: HospitalType.PRIVATE,
    charity: HospitalType.CHARITY,
  });

export const SeverityLevel = {
  LOW: 'Low',
  MEDIUM: 'Medium',
  HIGH: 'High',
  CRITICAL: 'Critical',
} as const;

export type SeverityLevel = (typeof SeverityLevel)[keyof typeof SeverityLevel];

export const VisitStatus = {
  COMPLETED: 'Completed',
  CANCELLED: 'Cancelled',
  PENDING: 'Pending',
} as const;

export type VisitStatus = (typeof VisitStatus)[keyof typeof VisitStatus];

// --- Dimension Defaults (applied when the optional column is blank) ---

export const HOSPITAL_DEFAULTS = Object.freeze({
  hospitalType: HospitalType.PRIVATE,
  bedsCount: 100,
  establishedYear: 2000,
});

export const DOCTOR_DEFAULTS = Object.freeze({
  specialization: 'General Medicine',
  qualification: 'MBBS',
  experienceYears: 5,
  consultationFee: 500,
});

export const DISEASE_DEFAULTS = Object.freeze({
  category: 'General',
  severityLevel: SeverityLevel.MEDIUM,
});

// --- Listing Limits ---

export const MAX_FAILED_ROWS_LISTED = 200;
export const DEFAULT_JOBS_PAGE_SIZE = 20;

// --- Upload Template ---

export const TEMPLATE_FILE_NAME = 'patient_visit_template.csv';

export const TEMPLATE_COLUMNS = [
  // patient
  'patient_name',
  'age',
  'gender',
  'phone',
  'email',
  'address',
  'city',
  'state',
  'pincode',
  // hospital
  'hospital_name',
  'hospital_type',
  'hospital_address',
  'hospital_city',
  'hospital_state',
  'hospital_pincode',
  'hospital_phone',
  'hospital_email',
  'beds_count',
  'established_year',
  // doctor
  'doctor_name',
  'specialization',
  'qualification',
  'experience_years',
  'consultation_fee',
  'doctor_phone',
  'doctor_email',
  // visit
  'visit_type',
  'visit_date',
  'total_cost',
  'payment_method',
  'visit_duration_minutes',
  'disease_name',
  'diagnosis',
] as const satisfies readonly VisitColumn[];

export const TEMPLATE_EXAMPLE_ROW: Readonly<Record<(typeof TEMPLATE_COLUMNS)[number], string>> =
  Object.freeze({
    patient_name: 'Asha Verma',
    age: '45',
    gender: 'Female',
    phone: '+91-9000000001',
    email: 'asha.verma@example.com',
    address: '12 Lake Road',
    city: 'Pune',
    state: 'Maharashtra',
    pincode: '411001',
    hospital_name: 'City Care Hospital',
    hospital_type: 'Private',
    hospital_address: '4 Station Road',
    hospital_city: 'Pune',
    hospital_state: 'Maharashtra',
    hospital_pincode: '411002',
    hospital_phone: '+91-2000000001',
    hospital_email: 'contact@citycare.example.com',
    beds_count: '250',
    established_year: '1998',
    doctor_name: 'Dr. Kiran Rao',
    specialization: 'Cardiology',
    qualification: 'MD',
    experience_years: '12',
    consultation_fee: '800',
    doctor_phone: '+91-9000000010',
    doctor_email: 'kiran.rao@citycare.example.com',
    visit_type: 'OPD',
    visit_date: '2024-05-15',
    total_cost: '2500',
    payment_method: 'UPI',
    visit_duration_minutes: '30',
    disease_name: 'Hypertension',
    diagnosis: 'Routine heart checkup',
  });
