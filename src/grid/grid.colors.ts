/**
 * ANSI escape sequences used when rendering the board to a colour terminal.
 */
export const colors = {
  reset: '\x1b[0m', // Reset all attributes
  bright: '\x1b[1m', // Bright/bold text
  neonAqua: '\x1b[38;5;51m', // Empty slot highlight
} as const;
