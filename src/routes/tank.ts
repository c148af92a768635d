/**
 * Tank Calculation Routes
 */

import { Router, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import {
  calculateCapacity,
  calculateTank,
  deriveDimensions,
  listAvailableFittings,
  recommendFittings
} from '../calculations/tank';
import { CatalogStore } from '../services/catalog';
import { settings } from '../services/settings';
import { ValidationError, decodeDimensions, decodeTankRequest, getInputOptions } from '../transformers/request';

const MAX_PAGE_SIZE = 500;
const DEFAULT_PAGE_SIZE = 100;

function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof ValidationError) {
    res.status(400).json({
      success: false,
      error: error.message,
      details: error.details
    });
    return;
  }

  console.error(`❌ ${context} error:`, error);
  res.status(500).json({
    success: false,
    error: error instanceof Error ? error.message : 'Unknown error occurred'
  });
}

function pageParam(raw: unknown, fallback: number, max: number): number {
  const value = typeof raw === 'string' ? Number.parseInt(raw, 10) : NaN;
  if (!Number.isFinite(value) || value < 0) return fallback;
  return Math.min(value, max);
}

export function createTankRouter(store: CatalogStore): Router {
  const router = Router();

  /**
   * POST /api/v1/tank/calculate
   * Full BOM with cost and weight summaries
   */
  router.post('/calculate', (req: Request, res: Response) => {
    try {
      const { config, warnings } = decodeTankRequest(req.body, {
        exchange_rate: settings.default_exchange_rate,
        currency: settings.local_currency
      });

      // held for the whole calculation; reloads swap the store, not this snapshot
      const result = calculateTank(config, store.current(), warnings);

      res.json({
        calculation_id: uuidv4(),
        calculated_at: new Date().toISOString(),
        ...result
      });
    } catch (error) {
      sendError(res, error, 'Calculation');
    }
  });

  /**
   * POST /api/v1/tank/capacity
   */
  router.post('/capacity', (req: Request, res: Response) => {
    try {
      const dims = deriveDimensions(decodeDimensions(req.body));
      res.json({ success: true, capacity: calculateCapacity(dims) });
    } catch (error) {
      sendError(res, error, 'Capacity');
    }
  });

  router.get('/options', (req: Request, res: Response) => {
    res.json(getInputOptions());
  });

  router.get('/fittings', (req: Request, res: Response) => {
    res.json({ fittings: listAvailableFittings() });
  });

  /**
   * POST /api/v1/tank/fittings/recommended
   * Drain / overflow per compartment plus a flange pair
   */
  router.post('/fittings/recommended', (req: Request, res: Response) => {
    try {
      const dims = deriveDimensions(decodeDimensions(req.body));
      res.json({ success: true, fittings: recommendFittings(dims) });
    } catch (error) {
      sendError(res, error, 'Fitting recommendation');
    }
  });

  router.get('/prices/:partNo', (req: Request, res: Response) => {
    const entry = store.current().get(req.params.partNo);
    if (!entry) {
      res.status(404).json({
        success: false,
        error: `Part ${req.params.partNo} not found`
      });
      return;
    }
    res.json(entry);
  });

  router.get('/prices', (req: Request, res: Response) => {
    const snapshot = store.current();
    const skip = pageParam(req.query.skip, 0, Number.MAX_SAFE_INTEGER);
    const limit = pageParam(req.query.limit, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);

    res.json({
      total: snapshot.size,
      skip,
      limit,
      parts: snapshot.list(skip, limit)
    });
  });

  /**
   * POST /api/v1/tank/catalog/reload
   * Builds a new snapshot and swaps it in; the old one stays on failure
   */
  router.post('/catalog/reload', async (req: Request, res: Response) => {
    try {
      const snapshot = await store.reload();
      res.json({ success: true, parts: snapshot.size, source: snapshot.source });
    } catch (error) {
      sendError(res, error, 'Catalog reload');
    }
  });

  return router;
}
