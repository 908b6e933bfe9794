import { injectable } from 'inversify';
import { PageComponent } from '../Component';
import { escapeHtml } from '../escapeHtml';

/**
 * Display fields read off the user's claims; empty when a claim is missing.
 */
export interface UserProfile {
    name: string;
    email: string;
    picture: string;
}

/**
 * Picture URLs other than http(s) render as an empty src.
 */
export function safeImageUrl(url: string): string {
    if (!URL.canParse(url)) {
        return '';
    }
    const { protocol } = new URL(url);
    return protocol === 'https:' || protocol === 'http:' ? url : '';
}

@injectable()
export class ProfilePage extends PageComponent {
    readonly title = 'User Profile';

    profile: UserProfile = { name: '', email: '', picture: '' };

    async render(): Promise<string> {
        const { name, email, picture } = this.profile;
        return [
            '<h1>User Profile</h1>',
            '<div class="profile">',
            `<img src="${escapeHtml(safeImageUrl(picture))}" alt="" class="avatar" />`,
            `<h2>${escapeHtml(name)}</h2>`,
            `<p>${escapeHtml(email)}</p>`,
            '</div>',
        ].join('\n');
    }
}
