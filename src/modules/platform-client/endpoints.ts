/**
 * Platform API paths, which differ between platform major versions, and the
 * upstream marketplace location of pack artifacts.
 */

import { UnsupportedItemTypeError } from '../../core/errors.js'
import { packKey } from '../../artifact-providers/artifact-provider.js'

/** Highest platform major version served by the older API surface */
export const XSOAR_OLD_VERSION = 6

export const MARKETPLACE_BASE_URL = 'https://marketplace.xsoar.paloaltonetworks.com'

export interface PlatformEndpoints {
  health: string
  installedPacks: string
  installedExpiredPacks: string
  packUpload: string
  caseSearch: string
  caseCreate: string
}

const LEGACY_ENDPOINTS: PlatformEndpoints = {
  health: '/health',
  installedPacks: '/contentpacks/metadata/installed',
  installedExpiredPacks: '/contentpacks/installed-expired',
  packUpload: '/contentpacks/installed/upload',
  caseSearch: '/incidents/search',
  caseCreate: '/incident',
}

const CURRENT_ENDPOINTS: PlatformEndpoints = {
  health: '/xsoar/health',
  installedPacks: '/xsoar/public/v1/contentpacks/metadata/installed',
  installedExpiredPacks: '/xsoar/contentpacks/installed-expired',
  packUpload: '/xsoar/public/v1/contentpacks/installed/upload',
  caseSearch: '/incidents/search',
  caseCreate: '/xsoar/public/v1/incident',
}

export function platformEndpoints(serverVersion: number): PlatformEndpoints {
  return serverVersion > XSOAR_OLD_VERSION ? CURRENT_ENDPOINTS : LEGACY_ENDPOINTS
}

/** Upstream marketplace URL of a pack artifact. */
export function marketplaceUrl(packId: string, packVersion: string): string {
  return `${MARKETPLACE_BASE_URL}/${packKey(packId, packVersion)}`
}

// ---------------------------------------------------------------------------
// Content items
// ---------------------------------------------------------------------------

export const SUPPORTED_ITEM_TYPES = ['playbook'] as const
export type ItemType = (typeof SUPPORTED_ITEM_TYPES)[number]
export type ItemAction = 'download' | 'attach' | 'detach'

function isItemType(value: string): value is ItemType {
  return SUPPORTED_ITEM_TYPES.some((type) => type === value)
}

/**
 * @throws {UnsupportedItemTypeError} for any type outside SUPPORTED_ITEM_TYPES
 */
export function itemEndpoint(action: ItemAction, itemType: string, itemId: string): string {
  if (!isItemType(itemType)) {
    throw new UnsupportedItemTypeError(itemType, SUPPORTED_ITEM_TYPES)
  }
  const id = encodeURIComponent(itemId)
  switch (action) {
    case 'download':
      return `/${itemType}/${id}/yaml`
    case 'attach':
      return `/${itemType}/attach/${id}`
    case 'detach':
      return `/${itemType}/detach/${id}`
  }
}
