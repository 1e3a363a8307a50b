// Notifications, shopping list and repairs

import { z } from 'zod';
import { asArray, asRecord, defineTool, fail, ok } from './types.js';

export const sendNotification = defineTool({
  name: 'send_notification',
  description: 'Send a notification: a persistent notification in the HA UI, or to a notify target such as a phone.',
  access: 'write',
  input: z.object({
    message: z.string().min(1),
    title: z.string().optional(),
    target: z.string().optional().describe("Notify service target (e.g. 'mobile_app_phone'). Empty for a persistent notification."),
  }),
  async execute({ message, title, target }, { ha }) {
    const data = { message, ...(title ? { title } : {}) };
    if (target) {
      const service = target.startsWith('notify.') ? target.slice('notify.'.length) : target;
      await ha.callService('notify', service, data);
      return ok({ sent_to: `notify.${service}` });
    }
    await ha.callService('persistent_notification', 'create', data);
    return ok({ sent_to: 'persistent_notification' });
  },
});

export const shoppingList = defineTool({
  name: 'shopping_list',
  description: 'Manage the shopping list: view items, add items, or mark items complete.',
  access: 'write_unless_list',
  input: z.object({
    action: z.enum(['list', 'add', 'complete']),
    name: z.string().optional().describe('Item name (add).'),
    item_id: z.string().optional().describe('Item id (complete, from list).'),
  }),
  async execute({ action, name, item_id }, { ha }) {
    switch (action) {
      case 'list': {
        const items = asArray(await ha.rest('GET', 'shopping_list')).map((i) => {
          const record = asRecord(i);
          return { id: record.id, name: record.name, complete: record.complete };
        });
        return ok({ count: items.length, items });
      }
      case 'add': {
        if (!name) return fail('name is required to add an item');
        return ok({ added: await ha.rest('POST', 'shopping_list/item', { name }) });
      }
      case 'complete': {
        if (!item_id) return fail('item_id is required to complete an item');
        return ok({ completed: await ha.rest('POST', `shopping_list/item/${encodeURIComponent(item_id)}`, { complete: true }) });
      }
    }
  },
});

export const getRepairs = defineTool({
  name: 'get_repairs',
  description: 'List open repair issues and diagnostics reported by Home Assistant.',
  access: 'read',
  input: z.object({
    include_ignored: z.boolean().default(false),
  }),
  async execute({ include_ignored }, { ha }) {
    const issues = asArray(asRecord(await ha.ws('repairs/list_issues')).issues)
      .map(asRecord)
      .filter((issue) => include_ignored || issue.ignored !== true)
      .map((issue) => ({
        domain: issue.domain,
        issue_id: issue.issue_id,
        severity: issue.severity,
        translation_key: issue.translation_key,
        learn_more_url: issue.learn_more_url,
        ignored: issue.ignored === true,
      }));
    return ok({ count: issues.length, issues });
  },
});

export const dismissRepair = defineTool({
  name: 'dismiss_repair',
  description: 'Ignore a repair issue so it no longer shows in the repairs list.',
  access: 'write',
  input: z.object({
    domain: z.string().min(1),
    issue_id: z.string().min(1),
  }),
  async execute({ domain, issue_id }, { ha }) {
    await ha.ws('repairs/ignore_issue', { domain, issue_id, ignore: true });
    return ok({ dismissed: `${domain}/${issue_id}` });
  },
});

export const notificationTools = [sendNotification, shoppingList, getRepairs, dismissRepair];
