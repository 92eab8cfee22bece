/**
 * Alert Templates: subject lines and bodies for alert batches and recoveries.
 *
 * The same template feeds every channel: console and webhook use title and
 * message, email additionally renders the HTML body.
 */

import type { AlertPolicy } from '../config/alertPolicy.js';
import type { AlertBatch, AlertEvent, AlertSeverity, RecoveryAlert } from './types.js';

export interface AlertTemplate {
  title: string;
  message: string;
  severity: AlertSeverity;
}

const SEVERITY_EMOJI: Record<AlertSeverity, string> = {
  critical: '🚨',
  warning: '⚠️',
  info: '✅',
};

const PRODUCT = 'Container Watch';
const RULE = '='.repeat(50);

const plural = (n: number, word: string): string => `${n} ${word}${n === 1 ? '' : 's'}`;

export const shortId = (containerId: string): string => containerId.slice(0, 12);

/** `YYYY-MM-DD HH:MM:SS UTC` */
export const formatTimestamp = (ms: number): string =>
  `${new Date(ms).toISOString().replace('T', ' ').slice(0, 19)} UTC`;

export const formatPercent = (value: number): string => `${value.toFixed(1)}%`;

export const containerUrl = (policy: AlertPolicy, containerId: string): string =>
  `${policy.baseUrl}/container/${containerId}`;

// ── Subjects ────────────────────────────────────────────────────────

export const batchSubject = (batch: AlertBatch): string => {
  const critical = batch.critical.length;
  const warning = batch.warning.length;
  if (critical > 0) {
    const base = `${SEVERITY_EMOJI.critical} CRITICAL: ${plural(critical, 'Container Issue')}`;
    return warning > 0 ? `${base} (+ ${plural(warning, 'Warning')})` : base;
  }
  return `${SEVERITY_EMOJI.warning} WARNING: ${plural(warning, 'Resource Alert')}`;
};

export const recoverySubject = (event: RecoveryAlert): string =>
  `${SEVERITY_EMOJI.info} RESOLVED: ${event.containerName} Container Recovered`;

// ── Plain text ──────────────────────────────────────────────────────

/** Lines describing one actionable alert, without the detail link. */
export const describeAlert = (event: AlertEvent, policy: AlertPolicy): string[] => {
  const lines = [`Container: ${event.containerName} (ID: ${shortId(event.containerId)})`];
  switch (event.kind) {
    case 'unhealthy':
      lines.push('Status: UNHEALTHY', `Time: ${formatTimestamp(event.timestamp)}`);
      break;
    case 'high_cpu':
    case 'high_ram':
      lines.push(
        `Issue: High ${event.kind === 'high_cpu' ? 'CPU' : 'RAM'} Usage`,
        `Current: ${formatPercent(event.value)} (threshold: ${event.threshold}%)`,
        `Duration: ${policy.durationMinutes} minutes`,
        `History: ${event.history.map(formatPercent).join(' -> ')}`
      );
      break;
    case 'recovery':
      lines.push('Status: RECOVERED');
      if (event.downtime) lines.push(`Downtime: ${event.downtime}`);
      break;
  }
  return lines;
};

const section = (label: string, events: readonly AlertEvent[], policy: AlertPolicy): string[] => {
  if (events.length === 0) return [];
  const lines = [`${label} (${events.length})`, RULE, ''];
  for (const event of events) {
    lines.push(...describeAlert(event, policy), `Details: ${containerUrl(policy, event.containerId)}`, '');
  }
  return lines;
};

export const renderBatchText = (batch: AlertBatch, policy: AlertPolicy): string =>
  [
    `${PRODUCT} - Container Alerts`,
    '='.repeat(35),
    '',
    `Timestamp: ${formatTimestamp(batch.timestamp)}`,
    '',
    ...section('CRITICAL ALERTS', batch.critical, policy),
    ...section('WARNING ALERTS', batch.warning, policy),
    '---',
    `${PRODUCT} Alert System`,
    `Dashboard: ${policy.baseUrl}`,
  ].join('\n');

export const renderRecoveryText = (event: RecoveryAlert, policy: AlertPolicy): string =>
  [
    `${PRODUCT} - Container Recovered`,
    '='.repeat(36),
    '',
    `Container: ${event.containerName}`,
    `ID: ${shortId(event.containerId)}`,
    '',
    'Previous Status: UNHEALTHY',
    'Current Status: HEALTHY',
    ...(event.downtime ? [`Downtime: ${event.downtime}`] : []),
    '',
    `Recovered At: ${formatTimestamp(event.timestamp)}`,
    '',
    `View Details: ${containerUrl(policy, event.containerId)}`,
    '',
    '---',
    `${PRODUCT} Alert System`,
  ].join('\n');

// ── HTML ────────────────────────────────────────────────────────────

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (text: string): string => text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);

const SECTION_COLOR: Record<AlertSeverity, string> = {
  critical: '#ef4444',
  warning: '#f59e0b',
  info: '#22c55e',
};

const htmlDocument = (title: string, heading: string, color: string, body: string, policy: AlertPolicy): string => `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <title>${escapeHtml(title)}</title>
</head>
<body style="margin:0;padding:0;font-family:'Segoe UI',Tahoma,sans-serif;background:#0f172a;color:#e2e8f0;">
  <div style="max-width:800px;margin:0 auto;padding:40px 20px;">
    <h1 style="color:#3b82f6;text-align:center;">${PRODUCT}</h1>
    <div style="border:2px solid ${color};border-radius:12px;padding:20px;margin-bottom:30px;text-align:center;">
      <h2 style="margin:0;color:${color};">${escapeHtml(heading)}</h2>
    </div>
${body}
    <p style="text-align:center;color:#64748b;font-size:14px;">
      ${PRODUCT} Alert System · <a href="${escapeHtml(policy.baseUrl)}" style="color:#3b82f6;">View Full Dashboard</a>
    </p>
  </div>
</body>
</html>`;

const htmlCard = (event: AlertEvent, policy: AlertPolicy, color: string): string => {
  const [header, ...details] = describeAlert(event, policy);
  const paragraphs = details.map((line) => `      <p style="margin:8px 0;">${escapeHtml(line)}</p>`).join('\n');
  return `    <div style="background:#1e293b;border-left:4px solid ${color};border-radius:8px;padding:20px;margin-bottom:15px;">
      <h3 style="margin:0 0 10px 0;">${escapeHtml(header ?? event.containerName)}</h3>
${paragraphs}
      <a href="${escapeHtml(containerUrl(policy, event.containerId))}" style="color:#3b82f6;">View Container Details</a>
    </div>`;
};

const htmlSection = (label: string, events: readonly AlertEvent[], severity: AlertSeverity, policy: AlertPolicy): string => {
  if (events.length === 0) return '';
  const color = SECTION_COLOR[severity];
  const cards = events.map((e) => htmlCard(e, policy, color)).join('\n');
  return `    <h2 style="color:${color};font-size:18px;">${SEVERITY_EMOJI[severity]} ${label} (${events.length})</h2>\n${cards}\n`;
};

export const renderBatchHtml = (batch: AlertBatch, policy: AlertPolicy): string => {
  const subject = batchSubject(batch);
  const body =
    `    <p style="text-align:center;color:#94a3b8;">${formatTimestamp(batch.timestamp)}</p>\n` +
    htmlSection('CRITICAL ALERTS', batch.critical, 'critical', policy) +
    htmlSection('WARNING ALERTS', batch.warning, 'warning', policy);
  const color = batch.critical.length > 0 ? SECTION_COLOR.critical : SECTION_COLOR.warning;
  return htmlDocument(`${PRODUCT} Alert`, subject, color, body, policy);
};

export const renderRecoveryHtml = (event: RecoveryAlert, policy: AlertPolicy): string => {
  const lines = [
    `ID: ${shortId(event.containerId)}`,
    'Previous Status: UNHEALTHY',
    'Current Status: HEALTHY',
    ...(event.downtime ? [`Downtime: ${event.downtime}`] : []),
    `Recovered At: ${formatTimestamp(event.timestamp)}`,
  ];
  const body = `    <div style="background:#1e293b;border-left:4px solid ${SECTION_COLOR.info};border-radius:8px;padding:20px;">
      <h3 style="margin:0 0 15px 0;">${escapeHtml(event.containerName)}</h3>
${lines.map((l) => `      <p style="margin:8px 0;">${escapeHtml(l)}</p>`).join('\n')}
      <a href="${escapeHtml(containerUrl(policy, event.containerId))}" style="color:#22c55e;">View Container Details</a>
    </div>`;
  return htmlDocument(`${PRODUCT} - Container Recovered`, 'RESOLVED: Container Recovered', SECTION_COLOR.info, body, policy);
};

// ── Template Factories ──────────────────────────────────────────────

export const alertTemplates = {
  batch(batch: AlertBatch, policy: AlertPolicy): AlertTemplate {
    return {
      title: batchSubject(batch),
      message: renderBatchText(batch, policy),
      severity: batch.critical.length > 0 ? 'critical' : 'warning',
    };
  },

  recovery(event: RecoveryAlert, policy: AlertPolicy): AlertTemplate {
    return {
      title: recoverySubject(event),
      message: renderRecoveryText(event, policy),
      severity: 'info',
    };
  },
};
