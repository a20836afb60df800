import { escapeHtml } from './escape';
import { renderDocument } from './layout';
import type { Item, NewItemInput } from '../types';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const pad2 = (n: number) => String(n).padStart(2, '0');

/** Formats as `Jan 02, 2006 15:04` in UTC. */
export function formatCreatedAt(date: Date): string {
  const month = MONTHS[date.getUTCMonth()];
  return `${month} ${pad2(date.getUTCDate())}, ${date.getUTCFullYear()} ${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}`;
}

export function renderHomePage(): string {
  return renderDocument(
    'Items',
    [
      '<h1>Item records</h1>',
      '<p>Manage items through the HTML pages below. API clients that send <code>Accept: application/json</code> get JSON from the same routes.</p>',
      '<div class="cta-buttons">',
      '<a href="/items" class="btn btn-secondary">View All Items</a>',
      '<a href="/create" class="btn btn-secondary">Create New Item</a>',
      '<a href="/api/v1/items" class="btn btn-secondary">Items API Route</a>',
      '</div>',
    ].join('\n'),
  );
}

function renderItemRow(item: Item): string {
  const cells = [
    String(item.id),
    escapeHtml(item.name),
    formatCreatedAt(item.createdAt),
    item.isActive ? 'Active' : 'Inactive',
    `<a href="/api/v1/items/${item.id}" class="btn btn-secondary">View JSON</a>`,
  ];
  return `<tr>${cells.map((cell) => `<td>${cell}</td>`).join('')}</tr>`;
}

export function renderItemsPage(items: Item[]): string {
  const content =
    items.length === 0
      ? '<p>No items found. Create your first item to get started!</p>'
      : [
          '<table class="table">',
          '<thead><tr><th>ID</th><th>Name</th><th>Created At</th><th>Status</th><th>Actions</th></tr></thead>',
          `<tbody>${items.map(renderItemRow).join('')}</tbody>`,
          '</table>',
        ].join('\n');

  return renderDocument(
    'Items List',
    [
      '<h1>Items Management</h1>',
      content,
      '<div class="cta-buttons">',
      '<a href="/" class="btn btn-secondary">Back to Home</a>',
      '<a href="/create" class="btn btn-primary">Create New Item</a>',
      '</div>',
    ].join('\n'),
  );
}

/**
 * The creation form. When `errorMessage` is set the form is being shown again
 * after a rejected submit: a banner carries the message and the submitted
 * values are filled back in.
 */
export function renderCreateForm(input: NewItemInput, errorMessage?: string): string {
  const parts = ['<h1>Create New Item</h1>'];
  if (errorMessage) {
    parts.push(`<div class="error-message">${escapeHtml(errorMessage)}</div>`);
  }

  const valueAttr = input.name ? ` value="${escapeHtml(input.name)}"` : '';
  const checkedAttr = input.isActive ? ' checked' : '';

  parts.push(
    '<form method="POST" action="/api/v1/items" enctype="application/x-www-form-urlencoded">',
    '<div class="form-group">',
    '<label for="name">Name:</label>',
    `<input type="text" name="name" id="name" required maxlength="50" placeholder="Enter item name"${valueAttr}>`,
    '</div>',
    '<div class="form-group">',
    `<label><input type="checkbox" name="isActive" id="isActive" value="true"${checkedAttr}> Item is active</label>`,
    '</div>',
    '<div class="form-actions">',
    '<button type="submit" class="btn btn-primary">Create Item</button>',
    '<a href="/items" class="btn btn-secondary">Cancel</a>',
    '</div>',
    '</form>',
    '<a href="/" class="btn btn-secondary">Back to Home</a>',
  );

  return renderDocument('Create Item', parts.join('\n'));
}
