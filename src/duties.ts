import type { DutyContext, DutyTemplate, DutyText } from './types.js';

export const DUTY_KINDS = ['support-vanguard', 'show-and-tell'] as const;

export type DutyKind = (typeof DUTY_KINDS)[number];

function withInfo(lines: string[], infoUrl?: string): string {
  return (infoUrl ? [...lines, `See ${infoUrl} for more details.`] : lines).join('\n\n');
}

export function supportVanguard(infoUrl?: string): DutyTemplate {
  return ({ sprint, week, startDay }: DutyContext): DutyText => ({
    summary: `Support Vanguard for ${sprint.name} week ${week} (${startDay})`,
    description: withInfo([`Provide support vanguard for the week from ${startDay}.`], infoUrl),
  });
}

export function showAndTell(infoUrl?: string): DutyTemplate {
  return ({ sprint, week, startDay }: DutyContext): DutyText => ({
    summary: `Show and Tell for ${sprint.name} week ${week} (${startDay})`,
    description: withInfo(
      [
        `It is your turn for a show and tell in the week from ${startDay}.`,
        'Please add a comment to this issue whether you have a topic you would like to present in public or not.',
      ],
      infoUrl
    ),
  });
}

export const DUTY_TEMPLATES: Record<DutyKind, (infoUrl?: string) => DutyTemplate> = {
  'support-vanguard': supportVanguard,
  'show-and-tell': showAndTell,
};
