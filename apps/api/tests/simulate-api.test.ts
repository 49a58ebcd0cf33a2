import { describe, it, expect, beforeAll } from 'vitest';
import { createDb } from '@splitloan/engine';
import type { Hono } from 'hono';
import { createApp } from '../src/app.js';
import { api } from './helpers.js';

const baseRequest = {
  totalBalance: 360000,
  annualRatePct: 7.5,
  termMonths: 120,
  startDate: '2026-11-30',
  payers: [
    { name: 'Payer 1', downPayment: 0 },
    { name: 'Payer 2', downPayment: 0 },
    { name: 'Payer 3', downPayment: 0 },
  ],
  extraPayments: [{ month: 6, payerName: 'Payer 1', amount: 10000 }],
};

describe('Simulate API', () => {
  let app: Hono;

  beforeAll(() => {
    app = createApp(createDb(':memory:'));
  });

  it('GET /health responds', async () => {
    const { status, data } = await api(app, 'GET', '/health');
    expect(status).toBe(200);
    expect(data.status).toBe('ok');
  });

  it('POST /api/v1/simulate returns ledger, schedules and summary', async () => {
    const { status, data } = await api(app, 'POST', '/api/v1/simulate', baseRequest);

    expect(status).toBe(200);
    expect(data.ledger).toHaveLength(3);
    expect(data.ledger[0].outstandingBalance).toBe(120000);
    expect(data.ledger[0].outstandingBalanceFormatted).toBe('R$ 120.000');
    expect(data.totals).toEqual({ downPayments: 0, outstanding: 360000, total: 360000 });
    expect(data.schedules).toHaveLength(3);
    expect(data.schedules[0].rows).toHaveLength(120);
    expect(data.monthly).toHaveLength(120);

    const first = data.schedules[0].rows[0];
    expect(first.calendarLabel).toBe('2026-12');
    expect(first.interestAmount).toBe(750);
    expect(first.installmentAmount).toBe(1750);
    expect(first.installmentFormatted).toBe('R$ 1.750,00');
    expect(first.balanceAfter).toBe(119000);
  });

  it('applies the extra payment to its payer only', async () => {
    const { data } = await api(app, 'POST', '/api/v1/simulate', baseRequest);

    expect(data.schedules[0].rows[5].balanceAfter).toBe(104000);
    expect(data.schedules[1].rows[5].balanceAfter).toBe(114000);
  });

  it('derives the last payment month per payer', async () => {
    const { data } = await api(app, 'POST', '/api/v1/simulate', baseRequest);

    expect(data.summary[0].lastActiveMonth).toBe(109);
    expect(data.summary[0].lastPaymentLabel).toBe('2035-12');
    expect(data.summary[0].lastPaymentDisplay).toBe('December/2035');
    expect(data.summary[1].lastActiveMonth).toBe(119);
    expect(data.summary[1].lastPaymentLabel).toBe('2036-10');
  });

  it('drops incomplete extra payment rows', async () => {
    const { status, data } = await api(app, 'POST', '/api/v1/simulate', {
      ...baseRequest,
      extraPayments: [
        { month: null, payerName: 'Payer 1', amount: 5000 },
        { month: 3, payerName: '', amount: 1000 },
        { month: 3, payerName: 'Payer 1', amount: null },
      ],
    });

    expect(status).toBe(200);
    expect(data.schedules[0].rows[2].balanceAfter).toBe(117000);
  });

  it('ignores extra payments for unknown payers', async () => {
    const { data } = await api(app, 'POST', '/api/v1/simulate', {
      ...baseRequest,
      extraPayments: [{ month: 1, payerName: 'Nobody', amount: 5000 }],
    });

    expect(data.schedules[0].rows[0].balanceAfter).toBe(119000);
  });

  it('rejects a zero term', async () => {
    const { status, data } = await api(app, 'POST', '/api/v1/simulate', { ...baseRequest, termMonths: 0 });

    expect(status).toBe(400);
    expect(data.error.code).toBe('VALIDATION_ERROR');
  });

  it('rejects an empty ledger', async () => {
    const { status, data } = await api(app, 'POST', '/api/v1/simulate', { ...baseRequest, payers: [] });

    expect(status).toBe(400);
    expect(data.error.code).toBe('VALIDATION_ERROR');
  });

  it('rejects a ledger with only unnamed payers', async () => {
    const { status, data } = await api(app, 'POST', '/api/v1/simulate', {
      ...baseRequest,
      payers: [{ name: '  ', downPayment: 0 }],
    });

    expect(status).toBe(400);
    expect(data.error.message).toBe('At least one payer with a name is required');
  });

  it('answers a malformed body with a validation error', async () => {
    const res = await app.request('/api/v1/simulate', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{oops',
    });
    const data = await res.json();

    expect(res.status).toBe(400);
    expect(data.error.code).toBe('VALIDATION_ERROR');
    expect(data.error.message).toBe('Request body is not valid JSON');
  });

  it('reports engine parameter errors', async () => {
    const { status, data } = await api(app, 'POST', '/api/v1/simulate', { ...baseRequest, startDate: '2026-13-01' });

    expect(status).toBe(400);
    expect(data.error.code).toBe('INVALID_PARAMETER');
    expect(data.error.suggestion).toBe("Check the 'startDate' value");
  });
});
