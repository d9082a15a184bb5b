import { describe, it, expect, beforeEach } from 'vitest';
import { NotFoundError } from '../../src/errors.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { GapService } from '../../src/services/GapService.js';
import type { DataGap, ParameterEstimate, ParameterEstimates } from '../../src/types/models.js';
import { MockDataGapRepository } from '../mocks/MockDataGapRepository.js';

const gaps: DataGap[] = [
  {
    parameter: 'recycling_rate',
    materialType: 'aluminum',
    category: 'missing',
    priority: 'high',
    dependents: ['cmur', 'material_recovery_rate', 'circularity_index', 'circularity_score'],
    declarationIndex: 5,
    observedValue: null,
    reason: 'not supplied',
  },
  {
    parameter: 'material',
    materialType: null,
    category: 'missing',
    priority: 'high',
    dependents: ['material_recovery_rate', 'circularity_index', 'circularity_score'],
    declarationIndex: 0,
    observedValue: null,
    reason: 'not supplied',
  },
];

const recyclingEstimate: ParameterEstimate = {
  parameter: 'recycling_rate',
  value: 0.69,
  confidence: 0.7,
  source: 'predicted',
  method: 'model',
  predictor: 'recycling-rate-aluminum',
  basedOn: [],
};

const estimates: ParameterEstimates = {
  recycling_rate: recyclingEstimate,
  material: {
    parameter: 'material',
    value: 'steel',
    confidence: 0.2,
    source: 'predicted',
    method: 'default',
    predictor: null,
    basedOn: [],
  },
};

describe('GapService', () => {
  let gapRepo: MockDataGapRepository;
  let logger: ConsoleLogProvider;
  let service: GapService;

  beforeEach(() => {
    gapRepo = new MockDataGapRepository();
    logger = new ConsoleLogProvider();
    service = new GapService(gapRepo, logger);
  });

  // --- track() ---

  it('should persist each gap with its estimate', async () => {
    const ids = await service.track('circularity', gaps, estimates);

    expect(ids).toEqual({ recycling_rate: 'gap-1', material: 'gap-2' });
    expect(gapRepo.rows[0]).toMatchObject({
      parameter: 'recycling_rate',
      analysis_type: 'circularity',
      dependent_count: 4,
      value_kind: 'numeric',
      predicted_value: '0.69',
      confidence_score: 0.7,
      method: 'model',
      predictor_name: 'recycling-rate-aluminum',
      status: 'pending',
    });
    expect(gapRepo.rows[1]).toMatchObject({ value_kind: 'categorical', predicted_value: 'steel', predictor_name: null });
  });

  it('should skip storage when there are no gaps', async () => {
    expect(await service.track('circularity', [], {})).toEqual({});
    expect(gapRepo.rows).toEqual([]);
  });

  it('should log and carry on when storage fails', async () => {
    gapRepo.failWith = new Error('timeout');

    expect(await service.track('circularity', gaps, estimates)).toEqual({});
    const [event] = logger.byLevel('error');
    expect(event.message).toBe('Failed to persist data gaps');
    expect(event.fields).toEqual({ analysisType: 'circularity', gapCount: 2, error: 'timeout' });
  });

  // --- findById() / markConfirmed() ---

  it('should read a tracked gap back as a domain object', async () => {
    await service.track('circularity', gaps, estimates);
    const gap = await service.findById('gap-1');

    expect(gap.predictedValue).toBe(0.69);
    expect(gap.predictorName).toBe('recycling-rate-aluminum');
    expect(gap.status).toBe('pending');
    expect(gap.confirmedAt).toBeNull();
    expect(gap.createdAt).toBeInstanceOf(Date);
  });

  it('should throw for an unknown gap', async () => {
    await expect(service.findById('gap-404')).rejects.toThrow(NotFoundError);
  });

  it('should record the confirmed value', async () => {
    await service.track('circularity', gaps, estimates);
    const confirmedAt = new Date('2026-02-01T09:30:00.000Z');
    const gap = await service.markConfirmed('gap-2', 'aluminum', confirmedAt);

    expect(gap.status).toBe('confirmed');
    expect(gap.actualValue).toBe('aluminum');
    expect(gap.confirmedAt).toEqual(confirmedAt);
  });

  it('should refuse to confirm a gap that is no longer pending', async () => {
    await service.track('circularity', gaps, estimates);
    await service.markConfirmed('gap-1', 0.7, new Date());

    await expect(service.markConfirmed('gap-1', 0.72, new Date())).rejects.toThrow('Data gap "gap-1" is not pending');
    expect(gapRepo.rows[0].actual_value).toBe('0.7');
  });

  // --- getStatistics() ---

  it('should summarize tracked gaps per parameter', async () => {
    await service.track('circularity', gaps, estimates);
    await service.track('circularity', [gaps[0]], {
      recycling_rate: { ...recyclingEstimate, confidence: 0.6 },
    });
    await service.markConfirmed('gap-1', 0.7, new Date());

    expect(await service.getStatistics()).toEqual({
      totalGaps: 3,
      confirmedGaps: 1,
      pendingGaps: 2,
      confirmationRate: 33.3,
      fieldPerformance: [
        { fieldName: 'recycling_rate', gapCount: 2, confirmedCount: 1, avgConfidence: 0.65 },
        { fieldName: 'material', gapCount: 1, confirmedCount: 0, avgConfidence: 0.2 },
      ],
    });
  });

  it('should report a zero confirmation rate without gaps', async () => {
    const stats = await service.getStatistics();
    expect(stats.confirmationRate).toBe(0);
    expect(stats.fieldPerformance).toEqual([]);
  });

  // --- countTracked() ---

  it('should count tracked gaps', async () => {
    await service.track('circularity', gaps, estimates);
    expect(await service.countTracked()).toBe(2);
  });
});
