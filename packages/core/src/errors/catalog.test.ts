import { describe, it, expect } from 'vitest'
import {
  DashboardSyncError,
  GrafanaApiError,
  MissingSourceError,
  InvalidSourceError,
  MissingDestinationError,
  UploadAbortedError,
} from './catalog.js'

describe('DashboardSyncError', () => {
  it('has correct errorCode, message, and details', () => {
    const err = new DashboardSyncError('BAD_INPUT', 'Bad input', { reason: 'test' })

    expect(err.errorCode).toBe('BAD_INPUT')
    expect(err.message).toBe('Bad input')
    expect(err.details).toEqual({ reason: 'test' })
  })

  it('toJSON() omits details when undefined', () => {
    expect(new DashboardSyncError('BAD_INPUT', 'Bad input').toJSON()).toEqual({
      error: { errorCode: 'BAD_INPUT', message: 'Bad input' },
    })
  })

  it('subclasses carry their error code and class name', () => {
    const cases: Array<{ err: DashboardSyncError; errorCode: string; name: string }> = [
      { err: new MissingSourceError(), errorCode: 'MISSING_SOURCE', name: 'MissingSourceError' },
      { err: new InvalidSourceError('/x'), errorCode: 'INVALID_SOURCE', name: 'InvalidSourceError' },
      {
        err: new MissingDestinationError(),
        errorCode: 'MISSING_DESTINATION',
        name: 'MissingDestinationError',
      },
      { err: new UploadAbortedError(), errorCode: 'UPLOAD_ABORTED', name: 'UploadAbortedError' },
    ]

    for (const { err, errorCode, name } of cases) {
      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(DashboardSyncError)
      expect(err.errorCode).toBe(errorCode)
      expect(err.name).toBe(name)
    }
  })

  it('InvalidSourceError records the offending path', () => {
    const err = new InvalidSourceError('/srv/dash.json')
    expect(err.message).toBe('Source is not a directory: /srv/dash.json')
    expect(err.details).toEqual({ path: '/srv/dash.json' })
  })
})

describe('GrafanaApiError', () => {
  it('describes the failed request', () => {
    const err = new GrafanaApiError(412, 'Precondition Failed', 'POST', '/api/folders')

    expect(err.message).toBe('Grafana error: POST /api/folders → 412 Precondition Failed')
    expect(err.status).toBe(412)
    expect(err.name).toBe('GrafanaApiError')
  })

  it('toJSON() includes status, method and path', () => {
    const err = new GrafanaApiError(500, 'Internal Server Error', 'GET', '/api/folders', {
      body: 'boom',
    })

    expect(err.toJSON()).toEqual({
      error: {
        errorCode: 'GRAFANA_API_ERROR',
        message: 'Grafana error: GET /api/folders → 500 Internal Server Error',
        status: 500,
        method: 'GET',
        path: '/api/folders',
        details: { body: 'boom' },
      },
    })
  })
})
