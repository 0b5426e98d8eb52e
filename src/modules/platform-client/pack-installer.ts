/**
 * PackInstaller: the platform's pack installation entry point.
 *
 * Deployment stages an artifact on disk and hands the path to an installer.
 * The default installer uploads it through the platform's content-pack
 * upload API.
 */

import { readFile } from 'fs/promises'
import { basename } from 'path'
import type { HttpResponse } from './http-transport.js'
import { platformEndpoints } from './endpoints.js'
import { ensureOk } from './responses.js'
import type { PlatformRequest } from './platform-client.js'

export interface InstallOptions {
  /** Skip the platform's pack validation step */
  skipValidation: boolean
  /** Skip signature verification */
  skipVerify: boolean
}

export interface PackInstaller {
  /**
   * Install the pack archive at `filePath`.
   * @throws {TransportError} when the platform rejects the upload
   */
  install(filePath: string, options: InstallOptions): Promise<void>
}

export type AuthenticatedRequester = (request: PlatformRequest) => Promise<HttpResponse>

function flag(value: boolean): string {
  return value ? 'true' : 'false'
}

export class PlatformPackInstaller implements PackInstaller {
  constructor(
    private readonly send: AuthenticatedRequester,
    private readonly serverVersion: number
  ) {}

  async install(filePath: string, options: InstallOptions): Promise<void> {
    const content = await readFile(filePath)
    const query = new URLSearchParams({
      skip_validation: flag(options.skipValidation),
      skip_verify: flag(options.skipVerify),
    })
    const response = await this.send({
      endpoint: `${platformEndpoints(this.serverVersion).packUpload}?${query.toString()}`,
      method: 'POST',
      files: {
        file: { filename: basename(filePath), content, contentType: 'application/zip' },
      },
    })
    ensureOk(response, `Upload of ${basename(filePath)}`)
  }
}
