import type { ImportDataType, ImportPlatform } from '@gcpanel/types';

/** Which data types each source platform can supply. */
export const PLATFORM_DATA_TYPES: Readonly<Record<ImportPlatform, readonly ImportDataType[]>> = {
  procore: ['documents', 'specifications', 'bids', 'daily_reports', 'budget', 'schedule', 'incidents'],
  plangrid: ['documents', 'daily_reports'],
  fieldwire: ['documents', 'daily_reports'],
  buildingconnected: ['bids'],
};

export function isSupported(platform: ImportPlatform, dataType: ImportDataType): boolean {
  return PLATFORM_DATA_TYPES[platform].includes(dataType);
}
