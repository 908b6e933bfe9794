import { injectable } from 'inversify';
import { RequestContext } from '@oidc-quickstart/core-context';
import { ServerContextKeys } from '@oidc-quickstart/http-server';
import { escapeHtml } from './escapeHtml';

const LINKS = [
    { href: '/', label: 'Home' },
    { href: '/profile', label: 'Profile' },
    { href: '/fetchdata', label: 'Fetch data' },
];

@injectable()
export class NavMenu {
    render(): string {
        const currentPath = (RequestContext.get(ServerContextKeys.REQUEST_URL) ?? '/').split('?')[0];
        const items = LINKS.map((link) => {
            const active = link.href === currentPath ? ' class="active"' : '';
            return `<li><a href="${escapeHtml(link.href)}"${active}>${escapeHtml(link.label)}</a></li>`;
        });
        return ['<nav>', '<ul>', ...items, '</ul>', '</nav>'].join('\n');
    }
}
