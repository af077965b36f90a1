/**
 * Page settings codec
 */

import { z } from 'zod';
import { parseWire, type Codec, type WireValue } from './codec.js';

export interface WebPageSettings {
  javascriptEnabled: boolean;
  loadImages: boolean;
  localToRemoteUrlAccessEnabled: boolean;
  userAgent: string;
  userName: string;
  password: string;
  xssAuditingEnabled: boolean;
  webSecurityEnabled: boolean;
  /** Resource load timeout in milliseconds; 0 means none */
  resourceTimeout: number;
}

/**
 * Domain key → engine key. Only the XSS flag is spelled differently.
 */
const WIRE_KEYS: Record<keyof WebPageSettings, string> = {
  javascriptEnabled: 'javascriptEnabled',
  loadImages: 'loadImages',
  localToRemoteUrlAccessEnabled: 'localToRemoteUrlAccessEnabled',
  userAgent: 'userAgent',
  userName: 'userName',
  password: 'password',
  xssAuditingEnabled: 'XSSAuditingEnabled',
  webSecurityEnabled: 'webSecurityEnabled',
  resourceTimeout: 'resourceTimeout',
};

const SETTING_KEYS: readonly (keyof WebPageSettings)[] = [
  'javascriptEnabled',
  'loadImages',
  'localToRemoteUrlAccessEnabled',
  'userAgent',
  'userName',
  'password',
  'xssAuditingEnabled',
  'webSecurityEnabled',
  'resourceTimeout',
];

const wireSettingsSchema = z.object({
  javascriptEnabled: z.boolean().default(false),
  loadImages: z.boolean().default(false),
  localToRemoteUrlAccessEnabled: z.boolean().default(false),
  userAgent: z.string().default(''),
  userName: z.string().nullish(),
  password: z.string().nullish(),
  XSSAuditingEnabled: z.boolean().default(false),
  webSecurityEnabled: z.boolean().default(false),
  resourceTimeout: z.number().nullish(),
});

/**
 * Encode only the keys present, so a partial update leaves other settings alone.
 */
export function encodeSettingsPatch(settings: Partial<WebPageSettings>): WireValue {
  const wire: Record<string, WireValue> = {};
  for (const key of SETTING_KEYS) {
    const value = settings[key];
    if (value !== undefined) {
      wire[WIRE_KEYS[key]] = value;
    }
  }
  return wire;
}

export const settingsCodec: Codec<WebPageSettings> = {
  type: 'settings',
  encode: encodeSettingsPatch,
  decode: (wire) => {
    const parsed = parseWire(wireSettingsSchema, 'settings', wire);
    return {
      javascriptEnabled: parsed.javascriptEnabled,
      loadImages: parsed.loadImages,
      localToRemoteUrlAccessEnabled: parsed.localToRemoteUrlAccessEnabled,
      userAgent: parsed.userAgent,
      userName: parsed.userName ?? '',
      password: parsed.password ?? '',
      xssAuditingEnabled: parsed.XSSAuditingEnabled,
      webSecurityEnabled: parsed.webSecurityEnabled,
      resourceTimeout: parsed.resourceTimeout ?? 0,
    };
  },
};
