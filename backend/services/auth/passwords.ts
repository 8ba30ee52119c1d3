import argon2 from 'argon2'

export const MIN_PASSWORD_LENGTH = 8

export function hashPassword(password: string) {
  return argon2.hash(password, { type: argon2.argon2id })
}

/** False for a wrong password and for a hash argon2 cannot parse. */
export async function verifyPassword(hash: string, password: string) {
  try {
    return await argon2.verify(hash, password)
  } catch {
    return false
  }
}
