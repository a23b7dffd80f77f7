// src/views/dashboard.ts
import type { EventPayload } from '../types.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** JSON safe to inline inside a <script> element. */
export function safeJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

export type DashboardView = {
  payload: EventPayload | null;
};

export function renderDashboard({ payload }: DashboardView): string {
  const updated = payload ? payload.updated_at.replace('T', ' ').split('.')[0] : 'never';
  const status = !payload ? 'Loading data' : payload.stale ? 'Data is stale' : 'Data is fresh';
  const newOrders = payload?.stats.new_orders ?? 0;
  const courierOrders = payload?.stats.courier_orders ?? 0;
  const sales = payload?.stats.sales;

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>Orders dashboard</title>
  <style>
    body { margin: 0; font-family: system-ui, sans-serif; background: #0b0f0d; color: #e5e5e5; }
    .container { max-width: 1100px; margin: 0 auto; padding: 24px 16px; }
    .grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(200px, 1fr)); gap: 16px; }
    .card { border: 1px solid #333; border-radius: 12px; padding: 16px; }
    .value { font-size: 40px; font-weight: 700; }
    .order { border: 1px solid #333; border-radius: 12px; padding: 12px 16px; margin-top: 12px; }
    .order.flash { box-shadow: 0 0 16px #23ffb4; }
    .stale { color: #ffd166; }
  </style>
</head>
<body>
  <div class="container">
    <h1>Orders dashboard</h1>
    <p>Updated: <strong id="updated-at">${escapeHtml(updated)}</strong>
      &middot; Status: <strong id="status-text" class="${payload?.stale ? 'stale' : ''}">${escapeHtml(status)}</strong>
      <button id="refresh-button" type="button">Refresh</button></p>
    <div class="grid">
      <div class="card"><div class="value" id="new-orders-count">${newOrders}</div><div>New orders</div></div>
      <div class="card"><div class="value" id="courier-orders-count">${courierOrders}</div><div>Handed to courier</div></div>
      <div class="card"><div class="value" id="sales-count">${sales?.count ?? 0}</div><div>Orders, last ${sales?.window_days ?? 7} days</div></div>
    </div>
    <div id="orders-list"><p>Loading data...</p></div>
  </div>
  <script>
    const initialPayload = ${safeJson(payload)};
    const list = document.getElementById('orders-list');
    const statusText = document.getElementById('status-text');
    const updatedAt = document.getElementById('updated-at');
    let known = new Set(((initialPayload && initialPayload.orders) || []).map((o) => o.id));

    const esc = (v) => String(v == null ? '' : v).replace(/[&<>"']/g, (c) => '&#' + c.charCodeAt(0) + ';');

    const render = (payload, highlight) => {
      if (!payload) return;
      document.getElementById('new-orders-count').textContent = payload.stats.new_orders;
      document.getElementById('courier-orders-count').textContent = payload.stats.courier_orders;
      document.getElementById('sales-count').textContent = payload.stats.sales.count;
      updatedAt.textContent = payload.updated_at.replace('T', ' ').split('.')[0];
      statusText.textContent = payload.stale ? 'Data is stale' : 'Data is fresh';
      statusText.classList.toggle('stale', Boolean(payload.stale));
      const orders = [...payload.orders].sort((a, b) => (b.moment_ms || 0) - (a.moment_ms || 0));
      list.innerHTML = orders.length
        ? orders.map((o) =>
            '<div class="order' + (highlight.has(o.id) ? ' flash' : '') + '">' +
            '<strong>' + esc(o.display_name) + '</strong> &middot; ' + esc(o.status) +
            '<div>' + esc(o.moment_display) + ' &middot; ' + esc(o.city || '') + ' &middot; ' + esc(o.recipient || '') + '</div>' +
            (o.link ? '<a href="' + esc(o.link) + '" target="_blank" rel="noreferrer">Open in ERP</a>' : '') +
            '</div>').join('')
        : '<p>No orders</p>';
    };

    const update = (payload) => {
      const ids = new Set(payload.orders.map((o) => o.id));
      const highlight = new Set([...ids].filter((id) => id && !known.has(id)));
      known = ids;
      render(payload, highlight);
    };

    render(initialPayload, new Set());

    document.getElementById('refresh-button').addEventListener('click', async (event) => {
      const button = event.currentTarget;
      button.disabled = true;
      statusText.textContent = 'Refreshing...';
      try {
        const res = await fetch('/refresh', { method: 'POST' });
        const body = await res.json();
        if (body.payload) update(body.payload);
        else statusText.textContent = 'Refresh failed';
      } catch (error) {
        statusText.textContent = 'Refresh failed';
      } finally {
        button.disabled = false;
      }
    });

    const source = new EventSource('/events');
    source.onmessage = (event) => {
      try {
        update(JSON.parse(event.data));
      } catch (error) {
        console.warn('Failed to parse event', error);
      }
    };
  </script>
</body>
</html>
`;
}
