import { writeFile } from 'fs/promises'
import { existsSync } from 'fs'
import { authenticate } from '@google-cloud/local-auth'
import { google, type Auth } from 'googleapis'
import { z } from 'zod'
import { ConfigError } from '@domain/errors.ts'
import { readJsonFile } from '@infrastructure/config/readJsonFile.ts'

// If modifying these scopes, delete the saved token file.
export const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets.readonly']

const clientKeySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
})

const credentialsSchema = z.object({
  installed: clientKeySchema.optional(),
  web: clientKeySchema.optional(),
})

export const savedTokenSchema = z.object({
  type: z.literal('authorized_user'),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
})

export type SavedToken = z.infer<typeof savedTokenSchema>

export interface AuthPaths {
  credentialsPath: string
  tokenPath: string
}

/** Client for a saved token; access tokens are refreshed on demand. */
export function createOAuthClient(token: SavedToken): Auth.OAuth2Client {
  const client = new google.auth.OAuth2(token.client_id, token.client_secret)
  client.setCredentials({ refresh_token: token.refresh_token })
  return client
}

async function readClientKey(credentialsPath: string): Promise<z.infer<typeof clientKeySchema>> {
  const credentials = await readJsonFile(credentialsPath, credentialsSchema)
  const key = credentials.installed ?? credentials.web
  if (!key) throw new ConfigError(`${credentialsPath} has neither "installed" nor "web" client keys`)
  return key
}

/**
 * Authorize against Google Sheets. Uses the saved token when there is one,
 * otherwise runs the browser consent flow and saves the resulting token.
 */
export async function authorize(paths: AuthPaths): Promise<Auth.OAuth2Client> {
  if (existsSync(paths.tokenPath)) {
    const token = await readJsonFile(paths.tokenPath, savedTokenSchema)
    return createOAuthClient(token)
  }

  const key = await readClientKey(paths.credentialsPath)
  const consented = await authenticate({
    scopes: SHEETS_SCOPES,
    keyfilePath: paths.credentialsPath,
  })

  const refreshToken = consented.credentials.refresh_token
  if (!refreshToken) throw new ConfigError('Google consent flow returned no refresh token')

  const token: SavedToken = {
    type: 'authorized_user',
    client_id: key.client_id,
    client_secret: key.client_secret,
    refresh_token: refreshToken,
  }
  await writeFile(paths.tokenPath, JSON.stringify(token))
  return createOAuthClient(token)
}
