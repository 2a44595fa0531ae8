import pc from 'picocolors';

export type ReportHeaderOptions = {
  title: string;
  details?: string[];
  useColor?: boolean;
};

const horizontalPadding = 2;

function drawBoxLine(innerWidth: number, left: string, right: string): string {
  return left + '─'.repeat(innerWidth) + right;
}

function centerLine(content: string, innerWidth: number): string {
  const padding = innerWidth - content.length;
  const leftPad = Math.floor(padding / 2);
  return '│' + ' '.repeat(leftPad) + content + ' '.repeat(padding - leftPad) + '│';
}

/** Boxed title with optional centered detail lines beneath it. */
export function renderReportHeader(options: ReportHeaderOptions): string {
  const { title, details = [], useColor = true } = options;
  const contentWidth = Math.max(title.length, ...details.map((detail) => detail.length));
  const innerWidth = contentWidth + horizontalPadding * 2;
  const style = (styler: (text: string) => string, text: string): string =>
    useColor ? styler(text) : text;

  return [
    style(pc.gray, drawBoxLine(innerWidth, '┌', '┐')),
    style(pc.white, centerLine(title, innerWidth)),
    ...details.map((detail) => style(pc.dim, centerLine(detail, innerWidth))),
    style(pc.gray, drawBoxLine(innerWidth, '└', '┘')),
  ].join('\n');
}
