import { format } from 'date-fns';

export function formatPublished(date?: Date): string {
  return date ? format(date, 'yyyy-MM-dd HH:mm') : 'unknown';
}

export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
