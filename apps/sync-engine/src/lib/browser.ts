import { spawn } from 'child_process';
import { serviceLoggers } from './logger';

const log = serviceLoggers.session;

function openerFor(platform: NodeJS.Platform): { command: string; args: (url: string) => string[] } {
    switch (platform) {
        case 'darwin':
            return { command: 'open', args: url => [url] };
        case 'win32':
            return { command: 'cmd', args: url => ['/c', 'start', '""', url] };
        default:
            return { command: 'xdg-open', args: url => [url] };
    }
}

// Best effort; the URL is always logged so it can be opened by hand
export function openBrowser(url: string, platform: NodeJS.Platform = process.platform): void {
    const opener = openerFor(platform);
    try {
        const child = spawn(opener.command, opener.args(url), { detached: true, stdio: 'ignore' });
        child.on('error', error => {
            log.warn({ err: error, command: opener.command }, 'Could not open browser');
        });
        child.unref();
    } catch (error) {
        log.warn({ err: error, command: opener.command }, 'Could not open browser');
    }
}
