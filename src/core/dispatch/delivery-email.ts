import { ServiceType } from '../domain/enums';
import { Order } from '../domain/models';
import { MailMessage } from '../interfaces';

const SERVICE_LABELS: Record<ServiceType, string> = {
  [ServiceType.TRANSCRIPTION]: 'transcription',
  [ServiceType.EXAM]: 'exam',
  [ServiceType.MEETING]: 'meeting minutes',
};

/**
 * Link back to the customer's dashboard, filtered to one order
 */
export function buildDashboardLink(dashboardUrl: string, orderId: string): string {
  const url = new URL(dashboardUrl);
  url.searchParams.set('order', orderId);
  return url.toString();
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Results email: one link per artifact plus the dashboard link
 */
export function renderDeliveryEmail(order: Order, dashboardUrl: string): MailMessage {
  const label = SERVICE_LABELS[order.serviceType];
  const dashboardLink = buildDashboardLink(dashboardUrl, order.id);

  const textLines = [
    `Hi ${order.customer.name},`,
    '',
    `Your ${label} order ${order.id} is ready. Download your files:`,
    '',
    ...order.artifacts.map((artifact) => `- ${artifact.name}: ${artifact.url}`),
    '',
    `You can also follow your orders at ${dashboardLink}`,
  ];

  const htmlItems = order.artifacts
    .map(
      (artifact) =>
        `<li><a href="${escapeHtml(artifact.url)}">${escapeHtml(artifact.name)}</a></li>`,
    )
    .join('');

  return {
    to: order.customer.email,
    subject: `Your ${label} order ${order.id} is ready`,
    text: textLines.join('\n'),
    html:
      `<p>Hi ${escapeHtml(order.customer.name)},</p>` +
      `<p>Your ${label} order ${order.id} is ready. Download your files:</p>` +
      `<ul>${htmlItems}</ul>` +
      `<p><a href="${escapeHtml(dashboardLink)}">Open your dashboard</a></p>`,
  };
}
