import { escapeHtml } from './layout';
import { repositories } from '../styles/widgets/repositoriesWidget';
import type { RepositoryEntry } from '../../data/schema';

export function repositorySummary(total: number, shown: number): string {
  if (total === 0) return 'No repositories are configured.';
  if (shown < total) return `Showing ${shown} of ${total} repositories.`;
  return `${total} ${total === 1 ? 'repository' : 'repositories'} configured.`;
}

export function renderRepositoriesWidget(repos: RepositoryEntry[], opts: { maxItems?: number } = {}): string {
  const shown = repos.slice(0, opts.maxItems ?? 10);

  const listHtml = shown.length > 0
    ? `<ul class="${repositories.element('list')}">${shown.map((repo) => {
        const name = repo.url
          ? `<a class="${repositories.element('repo-name')}" href="${escapeHtml(repo.url)}">${escapeHtml(repo.name)}</a>`
          : `<span class="${repositories.element('repo-name')}">${escapeHtml(repo.name)}</span>`;
        return `
        <li class="${repositories.elementClasses('repo', { 'is-hidden': !repo.visible })}">
          ${name}
          <span class="${repositories.element('repo-tool')}">${escapeHtml(repo.tool)}</span>
        </li>`;
      }).join('')}
      </ul>`
    : `<div class="${repositories.element('empty')}">Add a repository to start reviewing code.</div>`;

  return `<div class="${repositories.classes()}">
    <div class="${repositories.element('summary')}">${escapeHtml(repositorySummary(repos.length, shown.length))}</div>
    ${listHtml}
  </div>`;
}
