/**
 * Unit tests for business settings
 */

import { BusinessSettingsSchema, DEFAULT_BUSINESS_SETTINGS, isPosIntegrationEnabled } from '../settings.js';

describe('BusinessSettingsSchema', () => {
    it('applies defaults to an empty document', () => {
        expect(DEFAULT_BUSINESS_SETTINGS).toEqual({
            posIntegrationEnabled: false,
            branchId: 'default_branch',
            enableStockValidation: true,
            BranchOnlineSaleToSystem: {},
            businessName: '',
            phone: '',
            supportPhone: '',
        });
    });
});

describe('isPosIntegrationEnabled', () => {
    it('uses the global flag without an override', () => {
        const settings = BusinessSettingsSchema.parse({ posIntegrationEnabled: true, branchId: 'b1' });
        expect(isPosIntegrationEnabled(settings)).toBe(true);
    });

    it('lets the branch map override the global flag', () => {
        const settings = BusinessSettingsSchema.parse({
            posIntegrationEnabled: true,
            branchId: 'b1',
            BranchOnlineSaleToSystem: { b1: false, b2: true },
        });

        expect(isPosIntegrationEnabled(settings)).toBe(false);
        expect(isPosIntegrationEnabled(settings, 'b2')).toBe(true);
        expect(isPosIntegrationEnabled(settings, 'b3')).toBe(true);
    });
});
