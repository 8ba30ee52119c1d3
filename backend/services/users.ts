import { badRequest, notFound } from '../errors.js'
import { findUserById, updateUser, type User, type UserPatch } from '../repos/userRepo.js'
import { recordUpdate } from './audit.js'
import { userAuditState } from './auth/accounts.js'

/**
 * Apply a patch to a user and audit the fields that actually changed.
 */
export async function applyUserPatch(user: User, patch: UserPatch) {
  const updated = await updateUser(user.id, patch)
  if (!updated) throw notFound('User not found.')
  await recordUpdate('User', user.id, userAuditState(user), userAuditState(updated))
  return updated
}

export type ProfilePatch = Pick<UserPatch, 'firstName' | 'lastName' | 'phoneNumber' | 'dateOfBirth' | 'gender' | 'language' | 'specialtyName'>

/** Self-service edit. Only clinicians carry a specialty. */
export function updateProfile(user: User, patch: ProfilePatch) {
  const { specialtyName, ...rest } = patch
  return applyUserPatch(user, user.role === 'clinician' ? { ...rest, specialtyName } : rest)
}

/**
 * Point a patient at a clinician, or clear the assignment with null.
 */
export async function assignDoctor(patientId: number, doctorId: number | null) {
  const patient = await findUserById(patientId)
  if (!patient) throw notFound('Patient not found.')
  if (patient.role !== 'patient') throw badRequest('Doctors can only be assigned to patients.')

  if (doctorId !== null) {
    const doctor = await findUserById(doctorId)
    if (!doctor || doctor.role !== 'clinician') throw badRequest('Selected doctor is not a clinician.')
  }

  return applyUserPatch(patient, { assignedDoctorId: doctorId })
}
