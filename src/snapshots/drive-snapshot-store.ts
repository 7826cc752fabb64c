import { z } from 'zod'
import { SnapshotNotFoundError, SnapshotStoreError, errorMessage } from '../shared/errors.js'
import type { FetchFn } from '../shared/splitwise-client.js'
import { SNAPSHOT_SUFFIX, parseSnapshotDate } from './snapshot-codec.js'
import type { SnapshotRef, SnapshotStore } from './snapshot-store.js'

const TOKEN_URL = 'https://oauth2.googleapis.com/token'
const FILES_URL = 'https://www.googleapis.com/drive/v3/files'
const UPLOAD_URL = 'https://www.googleapis.com/upload/drive/v3/files'

export interface DriveCredentials {
  clientId: string
  clientSecret: string
  refreshToken: string
  folderId: string
}

export interface DriveStoreOptions extends DriveCredentials {
  timeoutMs: number
  fetch?: FetchFn
}

const tokenResponseSchema = z.object({ access_token: z.string().min(1) })

const fileListSchema = z.object({
  files: z.array(z.object({ id: z.string(), name: z.string() })),
  nextPageToken: z.string().optional(),
})

const createdFileSchema = z.object({ id: z.string() })

interface AuthorizedInit {
  method?: string
  body?: RequestInit['body']
  headers?: Record<string, string>
}

const mimeTypeFor = (name: string): string => (name.endsWith('.csv') ? 'text/csv' : 'application/json')

const readJson = async (response: Response, what: string): Promise<unknown> => {
  try {
    return await response.json()
  } catch (error) {
    throw new SnapshotStoreError(`${what} was not JSON`, { cause: error })
  }
}

/**
 * Snapshot store in a Google Drive folder, using the Drive v3 REST API with
 * an OAuth refresh token. The access token is fetched once per store.
 */
export const createDriveSnapshotStore = ({
  clientId,
  clientSecret,
  refreshToken,
  folderId,
  timeoutMs,
  fetch: fetchFn = fetch,
}: DriveStoreOptions): SnapshotStore => {
  let accessToken: Promise<string> | null = null

  const request = async (url: string, init: RequestInit = {}): Promise<Response> => {
    try {
      return await fetchFn(url, { ...init, signal: AbortSignal.timeout(timeoutMs) })
    } catch (error) {
      throw new SnapshotStoreError(`Google Drive request failed: ${errorMessage(error)}`, { cause: error })
    }
  }

  const requestToken = async (): Promise<string> => {
    const response = await request(TOKEN_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        client_id: clientId,
        client_secret: clientSecret,
        refresh_token: refreshToken,
        grant_type: 'refresh_token',
      }).toString(),
    })
    if (!response.ok) {
      throw new SnapshotStoreError(`Google OAuth token refresh failed: HTTP ${response.status}`)
    }
    const parsed = tokenResponseSchema.safeParse(await readJson(response, 'Google OAuth token response'))
    if (!parsed.success) {
      throw new SnapshotStoreError('Google OAuth token response has no access_token', { cause: parsed.error })
    }
    return parsed.data.access_token
  }

  const authorized = async (url: string, init: AuthorizedInit = {}): Promise<Response> => {
    const pending = accessToken ?? requestToken()
    accessToken = pending
    let token: string
    try {
      token = await pending
    } catch (error) {
      accessToken = null
      throw error
    }
    return request(url, {
      method: init.method,
      body: init.body,
      headers: { ...init.headers, Authorization: `Bearer ${token}` },
    })
  }

  const listSnapshots = async (): Promise<SnapshotRef[]> => {
    const refs: SnapshotRef[] = []
    let pageToken: string | undefined

    do {
      const params = new URLSearchParams({
        q: `'${folderId}' in parents and name contains '${SNAPSHOT_SUFFIX}' and trashed = false`,
        fields: 'nextPageToken, files(id, name)',
        pageSize: '1000',
      })
      if (pageToken) params.set('pageToken', pageToken)

      const response = await authorized(`${FILES_URL}?${params.toString()}`)
      if (!response.ok) {
        throw new SnapshotStoreError(`Cannot list Google Drive folder: HTTP ${response.status}`)
      }
      const parsed = fileListSchema.safeParse(await readJson(response, 'Google Drive file list'))
      if (!parsed.success) {
        throw new SnapshotStoreError('Unexpected Google Drive file list', { cause: parsed.error })
      }

      for (const file of parsed.data.files) {
        const date = parseSnapshotDate(file.name)
        if (date) refs.push({ id: file.id, name: file.name, date })
      }
      pageToken = parsed.data.nextPageToken
    } while (pageToken)

    return refs
  }

  const read = async (ref: SnapshotRef): Promise<string> => {
    const response = await authorized(`${FILES_URL}/${encodeURIComponent(ref.id)}?alt=media`)
    if (response.status === 404) throw new SnapshotNotFoundError(ref.name)
    if (!response.ok) {
      throw new SnapshotStoreError(`Cannot download ${ref.name}: HTTP ${response.status}`)
    }
    return response.text()
  }

  const findByName = async (name: string): Promise<string | null> => {
    const params = new URLSearchParams({
      q: `'${folderId}' in parents and name = '${name.replace(/'/g, "\\'")}' and trashed = false`,
      fields: 'files(id, name)',
      pageSize: '1',
    })
    const response = await authorized(`${FILES_URL}?${params.toString()}`)
    if (!response.ok) {
      throw new SnapshotStoreError(`Cannot look up ${name} in Google Drive: HTTP ${response.status}`)
    }
    const parsed = fileListSchema.safeParse(await readJson(response, 'Google Drive file list'))
    if (!parsed.success) {
      throw new SnapshotStoreError('Unexpected Google Drive file list', { cause: parsed.error })
    }
    return parsed.data.files[0]?.id ?? null
  }

  /**
   * Updates the content of the same-named file in the folder, or creates it.
   */
  const write = async (name: string, content: string): Promise<SnapshotRef> => {
    const existingId = await findByName(name)
    const metadata = existingId ? { name } : { name, parents: [folderId] }
    const type = mimeTypeFor(name)

    const form = new FormData()
    form.append('metadata', new Blob([JSON.stringify(metadata)], { type: 'application/json' }))
    form.append('file', new Blob([content], { type }))

    const response = existingId
      ? await authorized(`${UPLOAD_URL}/${encodeURIComponent(existingId)}?uploadType=multipart&fields=id`, {
          method: 'PATCH',
          body: form,
        })
      : await authorized(`${UPLOAD_URL}?uploadType=multipart&fields=id`, { method: 'POST', body: form })
    if (!response.ok) {
      throw new SnapshotStoreError(`Cannot upload ${name}: HTTP ${response.status}`)
    }
    const parsed = createdFileSchema.safeParse(await readJson(response, `Upload response for ${name}`))
    if (!parsed.success) {
      throw new SnapshotStoreError(`Upload of ${name} returned no file id`, { cause: parsed.error })
    }
    return { id: parsed.data.id, name, date: parseSnapshotDate(name) ?? '' }
  }

  return { label: 'Google Drive', listSnapshots, read, write }
}
