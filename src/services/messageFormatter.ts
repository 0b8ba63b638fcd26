/**
 * Message templates for domain alerts.
 *
 * Telegram sends `text`; email sends `subject` with `html` and `text`.
 */

import { ChannelConfig, Domain, FormattedMessage, NotificationType } from '../types';
import { formatUtc8 } from '../utils/time';

const SLOW_RESPONSE_MS = 2000;

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
};

export function escapeHtml(value: string): string {
    return value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

interface Line {
    label: string;
    value: string;
}

function render(subject: string, heading: string, lines: Line[]): FormattedMessage {
    const text = [heading, '', ...lines.map(line => `${line.label}: ${line.value}`)].join('\n');
    const html = [
        `<p><strong>${escapeHtml(heading)}</strong></p>`,
        '<ul>',
        ...lines.map(line => `<li>${escapeHtml(line.label)}: ${escapeHtml(line.value)}</li>`),
        '</ul>',
    ].join('\n');

    return { subject, text, html };
}

function headline(type: NotificationType, domain: Domain): { emoji: string; subject: string; summary: string } {
    switch (type) {
        case NotificationType.DOWN:
            return { emoji: '🔴', subject: `[DOWN] ${domain.name}`, summary: 'is DOWN' };
        case NotificationType.UP:
            return { emoji: '🟢', subject: `[RECOVERED] ${domain.name}`, summary: 'is back UP' };
        case NotificationType.STATUS:
            return {
                emoji: domain.totalTime > SLOW_RESPONSE_MS ? '🟠' : '🟢',
                subject: `[STATUS] ${domain.name}`,
                summary: 'status report',
            };
    }
}

export function formatDomainAlert(domain: Domain, type: NotificationType): FormattedMessage {
    const { emoji, subject, summary } = headline(type, domain);

    const lines: Line[] = [
        { label: 'Region', value: domain.region },
        { label: 'Status', value: String(domain.lastStatus) },
    ];
    if (type === NotificationType.DOWN && domain.errorDescription) {
        lines.push({ label: 'Error', value: domain.errorDescription });
    }
    lines.push({ label: 'Response time', value: `${domain.totalTime}ms` });
    lines.push({
        label: 'Last check',
        value: domain.lastCheck ? `${formatUtc8(domain.lastCheck)} (UTC+8)` : 'never',
    });

    return render(subject, `${emoji} Domain ${domain.name} ${summary}`, lines);
}

export function formatTestMessage(config: ChannelConfig, now: Date): FormattedMessage {
    return render('[TEST] Notification channel check', '✅ Test notification', [
        { label: 'Channel', value: config.name || config.address },
        { label: 'Sent at', value: `${formatUtc8(now)} (UTC+8)` },
    ]);
}
