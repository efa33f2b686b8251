import { describe, expect, it } from 'vitest'
import { InstallError, toInstallError } from '../install/errors'

function errnoError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code })
}

describe('toInstallError', () => {
  it('classifies permission failures', () => {
    const cause = errnoError('EACCES', 'permission denied')

    const error = toInstallError(cause, 'Cannot copy \'a.py\'', { candidatePath: 'a.py' })

    expect(error).toBeInstanceOf(InstallError)
    expect(error.code).toBe('PERMISSION_DENIED')
    expect(error.message).toBe('Cannot copy \'a.py\': permission denied')
    expect(error.cause).toBe(cause)
    expect(error.context).toEqual({ candidatePath: 'a.py' })
  })

  it('treats EPERM as a permission failure', () => {
    expect(toInstallError(errnoError('EPERM', 'operation not permitted'), 'Cannot link').code).toBe('PERMISSION_DENIED')
  })

  it('classifies other failures as operation failures', () => {
    const error = toInstallError(errnoError('ENOSPC', 'no space left on device'), 'Cannot copy')

    expect(error.code).toBe('OPERATION_FAILED')
    expect(error.message).toBe('Cannot copy: no space left on device')
  })

  it('handles values that are not errors', () => {
    expect(toInstallError('boom', 'Cannot link').message).toBe('Cannot link: boom')
  })

  it('passes install errors through unchanged', () => {
    const original = new InstallError('SOURCE_NOT_FOUND', 'gone')

    expect(toInstallError(original, 'Cannot copy')).toBe(original)
  })
})
