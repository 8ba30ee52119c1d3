import { access } from 'node:fs/promises'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import {
  cancerTypeNameTaken,
  deleteCancerType,
  findCancerType,
  updateCancerType,
  type CancerType
} from '../repos/cancerTypeRepo.js'
import {
  createDoctorRequest,
  findDoctorRequest,
  findPendingRequestForPatient,
  processDoctorRequest,
  type DoctorAssignmentRequest
} from '../repos/medicalRepo.js'
import { createMedicalDocument, medicalDocumentHashExists } from '../repos/medicalDocumentRepo.js'
import { findUserById, type User } from '../repos/userRepo.js'
import { recordCreate, recordDelete, recordUpdate } from './audit.js'
import {
  activityPercentages,
  addCancerType,
  canAccessPatient,
  decideDoctorRequest,
  editCancerType,
  registrationTrend,
  removeCancerType,
  requestDoctor,
  shortDayLabel,
  uploadMedicalDocument,
  type MedicalUploadFields
} from './medical.js'
import { resolveMediaPath } from './storage/files.js'

vi.mock('../repos/cancerTypeRepo.js', () => ({
  cancerTypeNameTaken: vi.fn(),
  createCancerType: vi.fn(),
  deleteCancerType: vi.fn(),
  findCancerType: vi.fn(),
  updateCancerType: vi.fn()
}))

vi.mock('../repos/medicalRepo.js', () => ({
  createDoctorRequest: vi.fn(),
  findDoctorRequest: vi.fn(),
  findPendingRequestForPatient: vi.fn(),
  findRecordByPatient: vi.fn(),
  processDoctorRequest: vi.fn(),
  upsertRecord: vi.fn()
}))

vi.mock('../repos/medicalDocumentRepo.js', () => ({
  createMedicalDocument: vi.fn(),
  medicalDocumentHashExists: vi.fn()
}))

vi.mock('../repos/userRepo.js', () => ({ findUserById: vi.fn() }))

vi.mock('./audit.js', () => ({
  recordCreate: vi.fn(),
  recordDelete: vi.fn(),
  recordUpdate: vi.fn()
}))

const NOW = new Date('2026-03-02T05:00:00Z')

function user(overrides: Partial<User> = {}): User {
  return {
    id: 1,
    email: 'person@example.com',
    passwordHash: 'hashed',
    firstName: 'Sam',
    lastName: 'Reyes',
    dateOfBirth: null,
    gender: null,
    phoneNumber: '',
    numericalIdentifier: null,
    role: 'patient',
    language: 'en',
    assignedDoctorId: null,
    specialtyName: '',
    isActive: true,
    isEmailVerified: true,
    dateJoined: NOW,
    lastLogin: null,
    ...overrides
  }
}

function doctorRequest(overrides: Partial<DoctorAssignmentRequest> = {}): DoctorAssignmentRequest {
  return {
    id: 'req-1',
    patientId: 1,
    patientName: 'Sam Reyes',
    patientEmail: 'person@example.com',
    doctorId: 2,
    doctorName: 'Lee Park',
    doctorSpecialty: 'Oncology',
    status: 'pending',
    requestedAt: NOW,
    processedAt: null,
    processedBy: null,
    notes: '',
    ...overrides
  }
}

const lung: CancerType = {
  id: 10,
  name: 'Lung',
  description: '',
  parentId: null,
  parentName: null,
  isOrgan: true,
  fullName: 'Lung'
}

beforeEach(() => {
  vi.clearAllMocks()
})

describe('activityPercentages', () => {
  it('keeps the three shares summing to 100', () => {
    expect(activityPercentages({ total: 3, active: 1, inactive: 1, suspended: 1 })).toEqual({
      active: 33.4,
      inactive: 33.3,
      suspended: 33.3
    })
  })

  it('reports zeros when there are no users', () => {
    expect(activityPercentages({ total: 0, active: 0, inactive: 0, suspended: 0 })).toEqual({
      active: 0,
      inactive: 0,
      suspended: 0
    })
  })
})

describe('registrationTrend', () => {
  it('covers the seven UTC days ending today, oldest first', () => {
    const trend = registrationTrend(
      new Map([
        ['2026-02-24', 2],
        ['2026-03-01', 5]
      ]),
      NOW
    )

    expect(trend.map((d) => d.date)).toEqual([
      '2026-02-24',
      '2026-02-25',
      '2026-02-26',
      '2026-02-27',
      '2026-02-28',
      '2026-03-01',
      '2026-03-02'
    ])
    expect(trend.map((d) => d.count)).toEqual([2, 0, 0, 0, 0, 5, 0])
    expect(trend[5]?.label).toBe('Mar 01')
  })

  it('labels days with a short month and padded day', () => {
    expect(shortDayLabel(new Date('2025-01-05T23:30:00Z'))).toBe('Jan 05')
  })
})

describe('canAccessPatient', () => {
  const patient = { id: 1, assignedDoctorId: 2 }

  it('lets administrators, the patient and the assigned clinician through', () => {
    expect(canAccessPatient(user({ id: 9, role: 'administrator' }), patient)).toBe(true)
    expect(canAccessPatient(user({ id: 1 }), patient)).toBe(true)
    expect(canAccessPatient(user({ id: 2, role: 'clinician' }), patient)).toBe(true)
  })

  it('keeps other clinicians and patients out', () => {
    expect(canAccessPatient(user({ id: 3, role: 'clinician' }), patient)).toBe(false)
    expect(canAccessPatient(user({ id: 4 }), patient)).toBe(false)
    expect(canAccessPatient(user({ id: 5, role: null }), patient)).toBe(false)
  })
})

describe('requestDoctor', () => {
  it('refuses a patient who already has a doctor', async () => {
    await expect(requestDoctor(user({ assignedDoctorId: 2 }), 2)).rejects.toMatchObject({
      status: 409,
      message: 'You already have an assigned doctor.'
    })
  })

  it('refuses a second pending request', async () => {
    vi.mocked(findPendingRequestForPatient).mockResolvedValue(doctorRequest())

    await expect(requestDoctor(user(), 2)).rejects.toMatchObject({
      status: 409,
      message: 'You already have a pending doctor request.'
    })
  })

  it('only accepts active clinicians', async () => {
    vi.mocked(findPendingRequestForPatient).mockResolvedValue(null)
    vi.mocked(findUserById).mockResolvedValue(user({ id: 2, role: 'patient' }))

    await expect(requestDoctor(user(), 2)).rejects.toMatchObject({ status: 404, message: 'Clinician not found.' })
    expect(createDoctorRequest).not.toHaveBeenCalled()
  })
})

describe('decideDoctorRequest', () => {
  const admin = user({ id: 9, role: 'administrator' })

  it('audits both the request and the assignment on approval', async () => {
    vi.mocked(findDoctorRequest).mockResolvedValue(doctorRequest())
    vi.mocked(processDoctorRequest).mockResolvedValue(doctorRequest({ status: 'approved', processedBy: 9 }))

    const processed = await decideDoctorRequest({ admin, requestId: 'req-1', approve: true, notes: '' })

    expect(processed.status).toBe('approved')
    expect(vi.mocked(recordUpdate).mock.calls).toEqual([
      ['DoctorAssignmentRequest', 'req-1', { status: 'pending' }, { status: 'approved' }],
      ['User', 1, { assignedDoctorId: null }, { assignedDoctorId: 2 }]
    ])
  })

  it('treats a request processed concurrently as already processed', async () => {
    vi.mocked(findDoctorRequest).mockResolvedValue(doctorRequest())
    vi.mocked(processDoctorRequest).mockResolvedValue(null)

    await expect(decideDoctorRequest({ admin, requestId: 'req-1', approve: false, notes: '' })).rejects.toMatchObject({
      status: 409,
      message: 'This request has already been processed.'
    })
    expect(recordUpdate).not.toHaveBeenCalled()
  })
})

describe('addCancerType', () => {
  it('rejects a duplicate name under the same organ', async () => {
    vi.mocked(findCancerType).mockResolvedValue(lung)
    vi.mocked(cancerTypeNameTaken).mockResolvedValue(true)

    await expect(addCancerType({ name: 'Adenocarcinoma', description: '', parentId: 10 })).rejects.toMatchObject({
      status: 400,
      message: 'A cancer type with this name already exists under the same parent.'
    })
  })

  it('only nests subtypes under an organ', async () => {
    vi.mocked(findCancerType).mockResolvedValue({ ...lung, id: 11, parentId: 10, isOrgan: false })

    await expect(addCancerType({ name: 'Small cell', description: '', parentId: 11 })).rejects.toMatchObject({
      status: 400,
      message: 'Subtypes can only be added under an organ-level cancer type.'
    })
  })
})

const adenocarcinoma: CancerType = {
  id: 11,
  name: 'Adenocarcinoma',
  description: '',
  parentId: 10,
  parentName: 'Lung',
  isOrgan: false,
  fullName: 'Lung - Adenocarcinoma'
}

describe('editCancerType', () => {
  it('keeps an organ at the top level', async () => {
    vi.mocked(findCancerType).mockResolvedValue(lung)

    await expect(editCancerType(10, { name: 'Lung', description: '', parentId: 12 })).rejects.toMatchObject({
      status: 400,
      message: 'An organ-level cancer type cannot be moved under another type.'
    })
    expect(updateCancerType).not.toHaveBeenCalled()
  })

  it('refuses to make a type its own parent', async () => {
    vi.mocked(findCancerType).mockResolvedValue(adenocarcinoma)

    await expect(editCancerType(11, { name: 'Adenocarcinoma', description: '', parentId: 11 })).rejects.toMatchObject({
      status: 400,
      message: 'A cancer type cannot be its own parent.'
    })
  })

  it('renames a subtype and audits the change', async () => {
    vi.mocked(findCancerType).mockImplementation(async (id) => (id === 10 ? lung : adenocarcinoma))
    vi.mocked(cancerTypeNameTaken).mockResolvedValue(false)
    vi.mocked(updateCancerType).mockResolvedValue({ ...adenocarcinoma, name: 'Adeno' })

    const updated = await editCancerType(11, { name: 'Adeno', description: '', parentId: 10 })

    expect(updated.name).toBe('Adeno')
    expect(recordUpdate).toHaveBeenCalledWith(
      'CancerType',
      11,
      { name: 'Adenocarcinoma', description: '', parentId: 10 },
      { name: 'Adeno', description: '', parentId: 10 }
    )
  })

  it('answers 404 for an unknown type', async () => {
    vi.mocked(findCancerType).mockResolvedValue(null)

    await expect(editCancerType(99, { name: 'X', description: '', parentId: null })).rejects.toMatchObject({
      status: 404,
      message: 'Cancer type not found.'
    })
  })
})

describe('removeCancerType', () => {
  it('deletes the type and audits its last state', async () => {
    vi.mocked(findCancerType).mockResolvedValue(adenocarcinoma)

    await removeCancerType(11)

    expect(deleteCancerType).toHaveBeenCalledWith(11)
    expect(recordDelete).toHaveBeenCalledWith('CancerType', 11, { name: 'Adenocarcinoma', description: '', parentId: 10 })
  })

  it('answers 404 for an unknown type', async () => {
    vi.mocked(findCancerType).mockResolvedValue(null)

    await expect(removeCancerType(99)).rejects.toMatchObject({ status: 404 })
    expect(deleteCancerType).not.toHaveBeenCalled()
  })
})

describe('uploadMedicalDocument', () => {
  const clinician = user({ id: 2, role: 'clinician' })
  const patient = user({ id: 1, assignedDoctorId: 2 })
  const fields: MedicalUploadFields = { description: '', patientNotes: '', cancerTypeId: 10 }
  const file = (originalname: string) => ({ originalname, buffer: Buffer.from('scan results') })

  it('lists the allowed extensions for an unknown one', async () => {
    await expect(
      uploadMedicalDocument({ uploader: clinician, patient, file: file('scan.exe'), fields })
    ).rejects.toMatchObject({
      status: 400,
      message: 'Unsupported file extension. Allowed extensions: pdf, doc, docx, txt, png, jpg, jpeg.'
    })
  })

  it('only files documents under an organ-level type', async () => {
    vi.mocked(findCancerType).mockResolvedValue(adenocarcinoma)

    await expect(
      uploadMedicalDocument({ uploader: clinician, patient, file: file('scan.pdf'), fields: { ...fields, cancerTypeId: 11 } })
    ).rejects.toMatchObject({ status: 400, message: 'Please select an organ-level cancer type.' })
    expect(medicalDocumentHashExists).not.toHaveBeenCalled()
  })

  it('rejects the same content twice for one patient', async () => {
    vi.mocked(findCancerType).mockResolvedValue(lung)
    vi.mocked(medicalDocumentHashExists).mockResolvedValue(true)

    await expect(
      uploadMedicalDocument({ uploader: clinician, patient, file: file('scan.pdf'), fields })
    ).rejects.toMatchObject({ status: 409, message: 'This document has already been uploaded for this patient.' })
    expect(createMedicalDocument).not.toHaveBeenCalled()
  })

  it('keeps clinicians away from patients assigned to someone else', async () => {
    await expect(
      uploadMedicalDocument({ uploader: user({ id: 3, role: 'clinician' }), patient, file: file('scan.pdf'), fields })
    ).rejects.toMatchObject({ status: 403 })
  })

  it('stores the document with defaults taken from the file', async () => {
    vi.mocked(findCancerType).mockResolvedValue(lung)
    vi.mocked(medicalDocumentHashExists).mockResolvedValue(false)
    vi.mocked(createMedicalDocument).mockImplementation(async (args) => ({ ...args, id: 'doc-1', uploadedAt: NOW }))

    const doc = await uploadMedicalDocument({ uploader: clinician, patient, file: file('scan.pdf'), fields })

    expect(doc).toMatchObject({ title: 'scan', documentType: 'PDF', cancerTypeId: 10, patientId: 1, uploadedBy: 2 })
    expect(recordCreate).toHaveBeenCalledWith('MedicalDocument', 'doc-1', {
      patientId: 1,
      title: 'scan',
      documentType: 'PDF',
      fileName: 'scan.pdf'
    })
  })

  it('removes the stored file when the document row cannot be written', async () => {
    vi.mocked(findCancerType).mockResolvedValue(lung)
    vi.mocked(medicalDocumentHashExists).mockResolvedValue(false)
    vi.mocked(createMedicalDocument).mockRejectedValue(new Error('insert failed'))

    await expect(
      uploadMedicalDocument({ uploader: clinician, patient, file: file('scan.pdf'), fields })
    ).rejects.toThrow('insert failed')

    const filePath = vi.mocked(createMedicalDocument).mock.calls[0]?.[0].filePath ?? ''
    expect(filePath).toMatch(/^medical_documents\/\d{4}\/\d{2}\/[0-9a-f-]+-scan\.pdf$/)
    await expect(access(resolveMediaPath(filePath))).rejects.toThrow()
    expect(recordCreate).not.toHaveBeenCalled()
  })
})
