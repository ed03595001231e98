import { describe, expect, it } from 'vitest';
import { DAY_MS, HOUR_MS } from '@shared/core';
import {
  buildRegulatoryReport,
  complianceStatus,
  recommendationsFor,
  reportTitle,
  summarizeIncidents,
} from '../src/compliance';
import { withAlertId, withReportId } from '../src/identifiers';
import { makeAlert, series } from './fixtures';

const NOW = Date.parse('2026-01-15T00:00:00.000Z');

describe('complianceStatus', () => {
  it('lists the five monitoring requirements and the next audit date', () => {
    const status = complianceStatus(NOW);
    expect(status.overall_status).toBe('compliant');
    expect(Object.keys(status.requirements)).toEqual([
      'article_72_1',
      'article_72_2',
      'article_72_3',
      'article_72_4',
      'article_72_5',
    ]);
    expect(status.requirements.article_72_3).toEqual({
      requirement: 'Serious incident reporting mechanism in place',
      status: 'compliant',
      last_verified: '2026-01-15T00:00:00.000Z',
    });
    expect(status.next_audit_due).toBe('2026-04-15T00:00:00.000Z');
  });
});

describe('recommendationsFor', () => {
  it('adds root cause review and threshold tuning when warranted', () => {
    const incidents = summarizeIncidents(
      Array.from({ length: 11 }, (_, index) =>
        makeAlert(index === 0 ? 'critical' : 'high', { timestamp: new Date(NOW - HOUR_MS).toISOString() }),
      ),
      { from: NOW - DAY_MS, to: NOW },
    );
    expect(recommendationsFor(incidents)).toEqual([
      'Review and address root causes of critical incidents',
      'Consider adjusting alert thresholds to reduce alert fatigue',
      'Continue regular monitoring and documentation updates',
    ]);
  });

  it('always recommends continued monitoring', () => {
    const incidents = summarizeIncidents([], { from: NOW - DAY_MS, to: NOW });
    expect(recommendationsFor(incidents)).toEqual(['Continue regular monitoring and documentation updates']);
  });
});

describe('buildRegulatoryReport', () => {
  it('summarises metrics and alerts inside the period', () => {
    const report = buildRegulatoryReport({
      id: withReportId('REG-000001'),
      reportType: 'periodic',
      periodDays: 30,
      now: NOW,
      series: {
        response_accuracy: [
          ...series('response_accuracy', [0.5], NOW - 40 * DAY_MS),
          ...series('response_accuracy', [1, 2, 3], NOW - DAY_MS, HOUR_MS),
        ],
        citation_accuracy: series('citation_accuracy', [0.9], NOW - 45 * DAY_MS),
      },
      alerts: [
        makeAlert('critical', { alert_id: withAlertId('ALT-000001'), timestamp: new Date(NOW - 2 * DAY_MS).toISOString() }),
        makeAlert('high', {
          alert_id: withAlertId('ALT-000002'),
          alert_type: 'threshold_hallucination_rate',
          timestamp: new Date(NOW - 3 * DAY_MS).toISOString(),
        }),
        makeAlert('high', { alert_id: withAlertId('ALT-000003'), timestamp: new Date(NOW - 60 * DAY_MS).toISOString() }),
      ],
    });

    expect(report).toMatchObject({
      report_id: 'REG-000001',
      report_type: 'periodic',
      status: 'draft',
      created_at: '2026-01-15T00:00:00.000Z',
      period_start: '2025-12-16T00:00:00.000Z',
      period_end: '2026-01-15T00:00:00.000Z',
      title: 'EU AI Act Article 72 Compliance Report - January 2026',
    });
    expect(report.metrics_summary).toEqual({
      response_accuracy: { count: 3, avg: 2, min: 1, max: 3, std: 1 },
    });
    expect(report.incidents_summary).toEqual({
      total_alerts: 2,
      by_severity: { critical: 1, high: 1 },
      by_type: { threshold_response_accuracy: 1, threshold_hallucination_rate: 1 },
      critical_count: 1,
      high_count: 1,
    });
    expect(report.summary.split('\n')).toEqual([
      'This report summarizes post-market monitoring activities',
      'in accordance with EU AI Act Article 72 requirements.',
      '',
      'Metrics tracked: 1',
      'Total alerts: 2',
      'Critical incidents: 1',
    ]);
    expect(report.recommendations).toEqual([
      'Review and address root causes of critical incidents',
      'Continue regular monitoring and documentation updates',
    ]);
  });

  it('names the month of the report date', () => {
    expect(reportTitle(Date.parse('2026-10-19T12:00:00.000Z'))).toBe('EU AI Act Article 72 Compliance Report - October 2026');
  });
});
