/** Shorten `text` to at most `max` characters for progress and log labels. */
export function truncate(text: string, max: number): string {
  return text.length <= max ? text : text.slice(0, max);
}

/** Render an email as the block every prompt embeds. */
export function formatEmailBlock(email: {
  sender: string;
  subject: string;
  body: string;
}): string {
  return `Sender: ${email.sender}\nSubject: ${email.subject}\nBody:\n${email.body}`;
}
