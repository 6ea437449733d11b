import { escapeHtml } from '@libs/telegram';

export interface DashboardView {
  title: string;
  pairs: string[];
  spreads: Record<string, number>;
  threshold: number;
  message?: string;
  refreshSeconds?: number;
}

export const formatSpreadCell = (spread: number | undefined): string =>
  spread === undefined ? '---' : spread.toFixed(2);

const renderRow = (pair: string, spread: number | undefined): string => {
  const safePair = escapeHtml(pair);
  return [
    '    <tr>',
    `      <td>${safePair}</td>`,
    `      <td>${formatSpreadCell(spread)}</td>`,
    '      <td>',
    '        <form action="/removepair" method="post" style="display:inline;">',
    `          <input type="hidden" name="pair" value="${safePair}">`,
    '          <button type="submit">❌</button>',
    '        </form>',
    '      </td>',
    '    </tr>',
  ].join('\n');
};

export const renderDashboard = (view: DashboardView): string => {
  const refreshMs = (view.refreshSeconds ?? 10) * 1000;
  const banner = view.message ? `  <p style="color: green;">${escapeHtml(view.message)}</p>\n` : '';
  const rows = view.pairs.map((pair) => renderRow(pair, view.spreads[pair])).join('\n');

  return `<!doctype html>
<html>
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(view.title)}</title>
</head>
<body>
  <h2>${escapeHtml(view.title)}</h2>
${banner}  <p>Monitored pairs (alert threshold ${view.threshold}%):</p>
  <table border="1" cellpadding="6" cellspacing="0">
    <tr><th>Pair</th><th>Spread (%)</th><th>Actions</th></tr>
${rows}
  </table>
  <br>
  <form action="/addpair" method="post">
    <input name="pair" placeholder="e.g. BTC/USDT" required>
    <button type="submit">➕ Add pair</button>
  </form>
  <script>
    setTimeout(() => { window.location.reload(); }, ${refreshMs});
  </script>
</body>
</html>
`;
};
