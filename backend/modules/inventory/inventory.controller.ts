import type { Request, Response } from 'express';

import { mapErrorToApiResponse } from '../../reliability/FailureHandling';
import { isDotThemeName } from '../../rendering/DotTheme';
import { telemetryStore } from '../../telemetry/TelemetryStore';
import { ISSUE_SEVERITIES, type IssueSeverity } from '../../validation/ValidationIssue';
import {
  getAssetDetail,
  getInventorySummary,
  getView,
  getViewDot,
  listAssets,
  listIssues,
  listViews,
} from './inventory.service';

const queryText = (value: unknown): string | undefined => {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed || undefined;
};

const parseBoolean = (value: unknown): boolean | undefined => {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
};

const isSeverity = (value: string): value is IssueSeverity => ISSUE_SEVERITIES.some((s) => s === value);

/** Unset is fine; anything else must name a severity. */
const parseSeverity = (req: Request, res: Response): { ok: true; value?: IssueSeverity } | { ok: false } => {
  const raw = queryText(req.query.severity);
  if (raw === undefined) return { ok: true };
  const upper = raw.toUpperCase();
  if (isSeverity(upper)) return { ok: true, value: upper };
  res.status(400).json({ success: false, errorMessage: `Invalid severity: ${raw}. Use ${ISSUE_SEVERITIES.join(', ')}.` });
  return { ok: false };
};

const sendError = (res: Response, err: unknown, operation: string) => {
  const { status, body } = mapErrorToApiResponse(err, { operation });
  res.status(status).json(body);
};

export function getInventory(_req: Request, res: Response) {
  try {
    res.json({ success: true, data: getInventorySummary() });
  } catch (err) {
    sendError(res, err, 'inventory.summary');
  }
}

export function getAssets(req: Request, res: Response) {
  const severity = parseSeverity(req, res);
  if (!severity.ok) return;

  try {
    const data = listAssets({
      type: queryText(req.query.type),
      tag: queryText(req.query.tag),
      severity: severity.value,
      includeArchived: parseBoolean(req.query.includeArchived) ?? false,
    });
    res.json({ success: true, data, total: data.length });
  } catch (err) {
    sendError(res, err, 'inventory.assets');
  }
}

export function getAsset(req: Request, res: Response) {
  const assetId = String(req.params.id ?? '').trim();
  if (!assetId) {
    res.status(400).json({ success: false, errorMessage: 'Asset id is required.' });
    return;
  }

  try {
    res.json({ success: true, data: getAssetDetail(assetId) });
  } catch (err) {
    sendError(res, err, 'inventory.asset');
  }
}

export function getIssues(req: Request, res: Response) {
  const severity = parseSeverity(req, res);
  if (!severity.ok) return;

  try {
    const data = listIssues({ severity: severity.value });
    res.json({ success: true, data, total: data.length });
  } catch (err) {
    sendError(res, err, 'inventory.issues');
  }
}

export function getViews(_req: Request, res: Response) {
  try {
    res.json({ success: true, data: listViews() });
  } catch (err) {
    sendError(res, err, 'inventory.views');
  }
}

export function getViewByName(req: Request, res: Response) {
  const name = String(req.params.name ?? '').trim();
  const format = queryText(req.query.format) ?? 'json';
  const theme = queryText(req.query.theme);

  if (format !== 'json' && format !== 'dot') {
    res.status(400).json({ success: false, errorMessage: `Invalid format: ${format}. Use json or dot.` });
    return;
  }
  if (theme !== undefined && !isDotThemeName(theme)) {
    res.status(400).json({ success: false, errorMessage: `Invalid theme: ${theme}. Use light or dark.` });
    return;
  }

  try {
    if (format === 'dot') {
      res.type('text/vnd.graphviz').send(getViewDot(name, theme));
      return;
    }
    res.json({ success: true, data: getView(name) });
  } catch (err) {
    sendError(res, err, 'inventory.view');
  }
}

export function getTelemetry(_req: Request, res: Response) {
  res.json({ success: true, data: telemetryStore.snapshot() });
}
