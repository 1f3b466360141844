/**
 * Business settings schema
 *
 * Stored as configuration/branch. Absent fields take the defaults below.
 */

import { z } from 'zod';

export const BusinessSettingsSchema = z.object({
    posIntegrationEnabled: z.boolean().default(false),
    branchId: z.string().min(1).default('default_branch'),
    enableStockValidation: z.boolean().default(true),
    /** Per-branch override of posIntegrationEnabled */
    BranchOnlineSaleToSystem: z.record(z.string(), z.boolean()).default({}),
    businessName: z.string().default(''),
    phone: z.string().default(''),
    supportPhone: z.string().default(''),
});

export type BusinessSettings = z.output<typeof BusinessSettingsSchema>;

export const DEFAULT_BUSINESS_SETTINGS: BusinessSettings = BusinessSettingsSchema.parse({});

/**
 * Whether online sales for a branch are mirrored to the till.
 * The per-branch map wins over the global flag.
 */
export function isPosIntegrationEnabled(settings: BusinessSettings, branchId: string = settings.branchId): boolean {
    const override = settings.BranchOnlineSaleToSystem[branchId];
    return override ?? settings.posIntegrationEnabled;
}
