/** page shown in the browser once the redirect has been handled */
export type CallbackPage =
  | { kind: 'success' }
  | { kind: 'provider-error'; code: string; description: string }
  | { kind: 'malformed' }
  | { kind: 'failure' };

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * escapes text for inclusion in html
 * @param text untrusted text, e.g. a provider supplied description
 * @returns html-safe text
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (character) => ESCAPES[character] ?? character);
}

/**
 * wraps a heading and message in a minimal standalone document
 * @param title heading and document title
 * @param message paragraph below the heading, already escaped
 * @returns html document
 */
function layout(title: string, message: string): string {
  return [
    '<!DOCTYPE html>',
    '<html>',
    `<head><meta charset="utf-8"><title>${title}</title></head>`,
    '<body style="font-family: sans-serif; text-align: center; padding: 3em;">',
    `<h1>${title}</h1>`,
    `<p>${message}</p>`,
    '</body>',
    '</html>',
  ].join('\n');
}

/**
 * renders the default page of a handled redirect
 * @param page outcome to render
 * @returns html document
 */
export function renderCallbackPage(page: CallbackPage): string {
  switch (page.kind) {
    case 'success':
      return layout(
        'Authentication successful',
        'You can close this window and return to the application.',
      );
    case 'provider-error':
      return layout(
        'Authentication failed',
        `${escapeHtml(page.code)}: ${escapeHtml(page.description)}`,
      );
    case 'malformed':
      return layout(
        'Authentication failed',
        'The redirect carried neither an authorization code nor an error.',
      );
    case 'failure':
      return layout(
        'Authentication error',
        'An unexpected error occurred while handling the redirect.',
      );
  }
}
