import { escapeHtml } from './layout';
import { sidebar } from '../styles/widgets/sidebar';
import type { DashboardData } from '../../data/schema';

export interface NavItem {
  id: string;
  label: string;
  href: string;
  badge?: number;
}

export interface NavSection {
  label: string;
  items: NavItem[];
}

export function buildNavigation(data: DashboardData, dashboardHref = '/embed/dashboard'): NavSection[] {
  return [
    {
      label: 'Overview',
      items: [{ id: 'dashboard', label: 'Dashboard', href: dashboardHref }],
    },
    {
      label: 'Manage',
      items: [
        { id: 'users', label: 'Users', href: '/admin/db/auth/user/', badge: data.serverActivity.users },
        { id: 'groups', label: 'Review groups', href: '/admin/db/reviews/group/', badge: data.serverActivity.groups },
        { id: 'repositories', label: 'Repositories', href: '/admin/db/scmtools/repository/', badge: data.repositories.length },
      ],
    },
    {
      label: 'System',
      items: [
        { id: 'settings', label: 'Settings', href: '/admin/settings/general/' },
        { id: 'extensions', label: 'Extensions', href: '/admin/extensions/' },
        { id: 'integrations', label: 'Integrations', href: '/admin/integrations/' },
      ],
    },
  ];
}

export function renderSidebar(opts: { title: string; sections: NavSection[]; activeId?: string }): string {
  const sectionsHtml = opts.sections.map((section) => `
    <div class="${sidebar.element('section')}">
      <div class="${sidebar.element('section-label')}">${escapeHtml(section.label)}</div>
      <ul class="${sidebar.element('items')}">${section.items.map((item) => `
        <li><a class="${sidebar.elementClasses('nav-item', { 'is-active': item.id === opts.activeId })}" href="${escapeHtml(item.href)}">
          <span class="${sidebar.element('item-label')}">${escapeHtml(item.label)}</span>
          ${item.badge !== undefined ? `<span class="${sidebar.element('item-badge')}">${escapeHtml(item.badge)}</span>` : ''}
        </a></li>`).join('')}
      </ul>
    </div>`).join('');

  return `
  <nav class="${sidebar.classes()}" aria-label="Administration">
    <div class="${sidebar.element('header')}">
      <div class="${sidebar.element('title')}">${escapeHtml(opts.title)}</div>
    </div>
    ${sectionsHtml}
  </nav>`;
}
