export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function formatDate(date: Date): string {
  return date.toLocaleDateString('ru-RU');
}

/** Имя пользователя для сообщений: @username или имя */
export function displayName(user: { username: string; firstName: string; telegramId: number }): string {
  if (user.username) return `@${user.username}`;
  if (user.firstName) return user.firstName;
  return String(user.telegramId);
}
