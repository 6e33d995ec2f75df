import { escapeHtml } from './layout';
import { fmtDate } from './format';
import { supportBanner, supportModifier, type SupportState } from '../styles/widgets/supportBanner';
import type { SupportStatus } from '../../data/schema';

const STATE_TEXT: Record<SupportState, { icon: string; title: string; action: string }> = {
  licensed: { icon: '✅', title: 'Support is active', action: 'Manage support' },
  expiring: { icon: '⏳', title: 'Support expires soon', action: 'Renew support' },
  expired: { icon: '⚠️', title: 'Support has expired', action: 'Renew support' },
  trial: { icon: '🧪', title: 'Trial license', action: 'Purchase support' },
  community: { icon: '💬', title: 'Community support', action: 'Get support' },
  unknown: { icon: '❔', title: 'Support status unavailable', action: 'Check status' },
};

export function renderSupportBanner(status: SupportStatus): string {
  const text = STATE_TEXT[status.state];

  const expiresHtml = status.expiresAt
    ? `<div class="${supportBanner.element('expires')}">${status.state === 'expired' ? 'Expired' : 'Expires'} ${escapeHtml(fmtDate(status.expiresAt))}</div>`
    : '';

  const actionHtml = status.url
    ? `<a class="${supportBanner.element('action')}" href="${escapeHtml(status.url)}" target="_blank" rel="noopener">${escapeHtml(text.action)}</a>`
    : '';

  return `
  <div class="${supportBanner.classes(supportModifier(status.state))}" role="status">
    <span class="${supportBanner.element('icon')}" aria-hidden="true">${text.icon}</span>
    <div class="${supportBanner.element('content')}">
      <div class="${supportBanner.element('title')}">${escapeHtml(text.title)}</div>
      <div class="${supportBanner.element('message')}">${escapeHtml(status.message)}</div>
      ${expiresHtml}
    </div>
    ${actionHtml}
  </div>`;
}
