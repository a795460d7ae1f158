import { TemplatePicker } from './types';

/**
 * Engagement message templates. Placeholders are `{{name}}` or
 * `{{name|default}}`.
 */
const TEMPLATES: Record<string, readonly string[]> = {
  welcome: [
    "Welcome to our service, {{userName}}! We're excited to have you on board.",
    'Hi {{userName}}, welcome! Let us know if you have any questions.',
    "Hello {{userName}}! Thanks for joining us. Here's what you can do...",
  ],
  follow_up: [
    'Hi {{userName}}, just following up on our conversation. Do you have any questions?',
    'Hello {{userName}}, we wanted to check if you need any assistance with your recent inquiry.',
    "Hi {{userName}}, we're here to help if you need any clarification.",
  ],
  tip: [
    'Pro tip, {{userName}}: {{tip|Did you know you can...}}',
    "{{userName}}, here's a helpful tip: {{tip|You can...}}",
    'Just a quick tip, {{userName}}: {{tip|Try this trick to...}}',
  ],
  promotion: [
    '{{userName}}, we have a special offer just for you! {{promoDetails}}',
    'Exclusive deal for you, {{userName}}: {{promoDetails}}',
    "{{userName}}, don't miss out on this limited-time offer! {{promoDetails}}",
  ],
  abandoned_cart: [
    'Hi {{userName}}, you left something in your cart! Complete your purchase now.',
    '{{userName}}, your cart is waiting! Complete your order before these items are gone.',
    "Don't forget about your cart, {{userName}}! Your selected items are still available.",
  ],
};

const GENERIC_TEMPLATES: readonly string[] = [
  'Hello {{userName}}, we have an update for you!',
  'Hi {{userName}}, just wanted to share something with you.',
  '{{userName}}, we thought you might find this interesting.',
];

export function templatesFor(engagementType: string): readonly string[] {
  return Object.prototype.hasOwnProperty.call(TEMPLATES, engagementType)
    ? TEMPLATES[engagementType]
    : GENERIC_TEMPLATES;
}

export const pickRandom: TemplatePicker = (candidates) =>
  candidates[Math.floor(Math.random() * candidates.length)];

export const pickFirst: TemplatePicker = (candidates) => candidates[0];

export function renderTemplate(template: string, vars: Record<string, unknown>): string {
  const body = template.replace(/\{\{(\w+)(?:\|([^}]*))?\}\}/g, (_match, name: string, fallback?: string) => {
    const value = vars[name];
    if (value === undefined || value === null || value === '') return fallback ?? '';
    return String(value);
  });
  return body.trim();
}
