import { fireEvent, render, screen } from '@testing-library/react';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ParameterPanel } from './ParameterPanel';
import type { DashboardParameters } from '@/lib/pipeline';

const parameters: DashboardParameters = {
    station: 'RFBRC',
    variables: ['air_temp'],
    range: { start: '2025-02-06', end: '2025-02-07' }
};

describe('ParameterPanel', () => {
    const onStationChange = vi.fn();
    const onVariablesChange = vi.fn();
    const onDateRangeChange = vi.fn();

    beforeEach(() => {
        vi.clearAllMocks();
        render(
            <ParameterPanel
                parameters={parameters}
                onStationChange={onStationChange}
                onVariablesChange={onVariablesChange}
                onDateRangeChange={onDateRangeChange}
            />
        );
    });

    it('reports the selected station', () => {
        fireEvent.change(screen.getByLabelText('Select Station'), { target: { value: 'RFSMM' } });
        expect(onStationChange).toHaveBeenCalledWith('RFSMM');
    });

    it('appends a newly ticked variable to the selection', () => {
        fireEvent.click(screen.getByRole('checkbox', { name: 'soil_temp' }));
        expect(onVariablesChange).toHaveBeenCalledWith(['air_temp', 'soil_temp']);
    });

    it('removes an unticked variable', () => {
        fireEvent.click(screen.getByRole('checkbox', { name: 'air_temp' }));
        expect(onVariablesChange).toHaveBeenCalledWith([]);
    });

    it('reports both range endpoints when one changes', () => {
        fireEvent.change(screen.getByLabelText('Start date'), { target: { value: '2025-02-01' } });
        expect(onDateRangeChange).toHaveBeenCalledWith('2025-02-01', '2025-02-07');
    });
});
