/**
 * Inline HTML pages returned by the non-API routes.
 */

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderPage(title: string, body: string): string {
  return `<!doctype html>
<html lang="it">
  <head>
    <meta charset="UTF-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0" />
    <title>${escapeHtml(title)}</title>
    <style>
      body { font-family: Arial, sans-serif; padding: 40px; background: #f8fafc; color: #0b0f1a; }
      .card { max-width: 520px; margin: 0 auto; background: #fff; padding: 32px; border-radius: 24px; }
      a { color: #0b0f1a; }
      label { display: block; margin-top: 16px; }
      input { width: 100%; padding: 8px; margin-top: 4px; box-sizing: border-box; }
      button { margin-top: 24px; padding: 10px 18px; border-radius: 12px; border: 0; background: #0b0f1a; color: #fff; }
    </style>
  </head>
  <body>
    <div class="card">
${body}
    </div>
  </body>
</html>
`;
}

export function renderMessagePage(title: string, message: string): string {
  return renderPage(
    title,
    `      <h1>${escapeHtml(title)}</h1>
      <p>${escapeHtml(message)}</p>
      <p><a href="/">Torna alla pagina principale</a></p>`
  );
}

export interface ConfirmationPageInput {
  fullName: string;
  slot: string;
  emailSent: boolean;
  cancelPath: string;
}

export function renderConfirmationPage(input: ConfirmationPageInput): string {
  const emailStatus = input.emailSent
    ? 'Conferma inviata via email.'
    : 'Prenotazione salvata. Configura SMTP per inviare la conferma.';

  return renderPage(
    'Prenotazione ricevuta',
    `      <h1>Grazie, ${escapeHtml(input.fullName)}.</h1>
      <p>La tua richiesta e stata registrata per <strong>${escapeHtml(input.slot)}</strong>.</p>
      <p><strong>${escapeHtml(emailStatus)}</strong></p>
      <p>Se devi annullare: <a href="${escapeHtml(input.cancelPath)}">Annulla prenotazione</a></p>
      <p><a href="/">Torna alla pagina principale</a></p>`
  );
}

export function renderLoginPage(errorMessage?: string): string {
  const error = errorMessage ? `\n      <p><strong>${escapeHtml(errorMessage)}</strong></p>` : '';

  return renderPage(
    'Area riservata',
    `      <h1>Area riservata</h1>${error}
      <form method="post" action="/admin/login">
        <label>Utente <input name="username" autocomplete="username" required /></label>
        <label>Password <input name="password" type="password" autocomplete="current-password" required /></label>
        <button type="submit">Accedi</button>
      </form>`
  );
}
