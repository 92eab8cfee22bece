import type { z } from 'zod';
import type { configSchema } from './schema.js';
import type { alertPolicySchema } from './alertPolicy.js';

export type AppConfig = z.infer<typeof configSchema>;

export type AlertPolicyData = z.infer<typeof alertPolicySchema>;
export type ContainerRule = AlertPolicyData['container_rules'][number];
export type EmailSettings = AlertPolicyData['notifications']['email'];
export type DiscordSettings = AlertPolicyData['notifications']['discord'];
