import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { PolicyViolation } from '../src/errors';
import {
  PullRequestContext,
  RepoMilestone,
  VersionedLabel,
} from '../src/interfaces';
import { checkBackportLabels } from '../src/operations/check-labels';
import {
  calculateMilestone,
  setMilestone,
} from '../src/operations/set-milestone';
import { parseVersion } from '../src/utils/version-util';
import {
  backportLabel,
  FakeRepoClient,
  makeSettings,
} from './helpers/fake-repo-client';

const m120: RepoMilestone = { number: 20, title: '1.2.0' };
const m130: RepoMilestone = { number: 30, title: '1.3.0' };
const m140: RepoMilestone = { number: 40, title: '1.4.0' };

const versioned = (
  name: string,
  branch: string,
  milestone: RepoMilestone | null,
): VersionedLabel => ({
  label: { name, description: null },
  branch: { name: branch },
  milestone,
  version: milestone ? parseVersion(milestone.title, '') : null,
});

const backportLabels = new Map<string, VersionedLabel>([
  ['backport-1.2.x', versioned('backport-1.2.x', '1.2.x', m120)],
  ['backport-1.3.x', versioned('backport-1.3.x', '1.3.x', m130)],
  ['no-backport', versioned('no-backport', 'main', m140)],
]);

const prWith = (...labels: string[]): PullRequestContext => ({
  backportLabels,
  labels,
  noBackportLabel: 'no-backport',
  issueNumber: 7,
});

describe('policy', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('checkBackportLabels()', () => {
    it('requires a backport label', () => {
      expect(() => checkBackportLabels(prWith(), makeSettings())).toThrow(
        new PolicyViolation('PR requires backport labeling'),
      );
    });

    it('rejects no-backport alongside a backport label', () => {
      expect(() =>
        checkBackportLabels(
          prWith('no-backport', 'backport-1.2.x'),
          makeSettings(),
        ),
      ).toThrow(
        new PolicyViolation('PR has both a no-backport and backport labels'),
      );
    });

    it('accepts several backport labels', () => {
      expect(() =>
        checkBackportLabels(
          prWith('backport-1.2.x', 'backport-1.3.x'),
          makeSettings(),
        ),
      ).not.toThrow();
    });

    it('accepts the no-backport label on its own', () => {
      expect(() =>
        checkBackportLabels(prWith('no-backport'), makeSettings()),
      ).not.toThrow();
    });

    it('does nothing when the check is disabled', () => {
      expect(() =>
        checkBackportLabels(prWith(), makeSettings({ runCheck: false })),
      ).not.toThrow();
      expect(console.info).not.toHaveBeenCalled();
    });

    it('reports the available and found labels', () => {
      checkBackportLabels(prWith('backport-1.3.x'), makeSettings());

      expect(console.info).toHaveBeenCalledWith(
        "checkBackportLabels: Available backport labels: ['backport-1.2.x', 'backport-1.3.x', 'no-backport']",
      );
      expect(console.info).toHaveBeenCalledWith(
        "checkBackportLabels: Found backport labels: ['backport-1.3.x']",
      );
    });
  });

  describe('calculateMilestone()', () => {
    it('picks the lowest version among the backport labels', () => {
      expect(
        calculateMilestone(prWith('backport-1.3.x', 'backport-1.2.x')),
      ).toBe(m120);
    });

    it('uses the no-backport milestone when no-backport is present', () => {
      expect(calculateMilestone(prWith('no-backport'))).toBe(m140);
      expect(calculateMilestone(prWith('backport-1.2.x', 'no-backport'))).toBe(
        m140,
      );
    });

    it('requires at least one label', () => {
      expect(() => calculateMilestone(prWith())).toThrow(
        'PR requires backport labeling',
      );
    });

    it('fails when a label has no resolved milestone', () => {
      const pr: PullRequestContext = {
        backportLabels: new Map([
          ['backport-1.2.x', versioned('backport-1.2.x', '1.2.x', null)],
        ]),
        labels: ['backport-1.2.x'],
        noBackportLabel: 'no-backport',
        issueNumber: 7,
      };

      expect(() => calculateMilestone(pr)).toThrow(
        'No milestone resolved for label backport-1.2.x',
      );
    });
  });

  describe('setMilestone()', () => {
    let client: FakeRepoClient;

    beforeEach(() => {
      client = new FakeRepoClient({ labels: [backportLabel('1.2.x')] });
    });

    it('sets the calculated milestone when none is set', async () => {
      await setMilestone(
        client,
        prWith('backport-1.2.x', 'backport-1.3.x'),
        makeSettings(),
      );

      expect(client.getIssue).toHaveBeenCalledWith(7);
      expect(client.setMilestone).toHaveBeenCalledWith(7, m120);
      expect(console.info).toHaveBeenCalledWith(
        'setMilestone: Current milestone: None',
      );
      expect(console.info).toHaveBeenCalledWith(
        'setMilestone: Setting milestone to: 1.2.0',
      );
    });

    it('writes again when the current milestone already matches', async () => {
      client.issue = { number: 7, milestone: { ...m130 } };

      await setMilestone(client, prWith('backport-1.3.x'), makeSettings());

      expect(client.setMilestone).toHaveBeenCalledWith(7, m130);
    });

    it('refuses to replace a different milestone', async () => {
      client.issue = { number: 7, milestone: m130 };

      await expect(
        setMilestone(client, prWith('backport-1.2.x'), makeSettings()),
      ).rejects.toThrow(
        new PolicyViolation('PR already has milestone: 1.3.0'),
      );
      expect(client.setMilestone).not.toHaveBeenCalled();
    });

    it('replaces a different milestone when overwriting', async () => {
      client.issue = { number: 7, milestone: m130 };

      await setMilestone(
        client,
        prWith('backport-1.2.x'),
        makeSettings({ overwrite: true }),
      );

      expect(client.setMilestone).toHaveBeenCalledWith(7, m120);
    });

    it('does nothing when milestones are disabled', async () => {
      await setMilestone(
        client,
        prWith('backport-1.2.x'),
        makeSettings({ runMilestone: false }),
      );

      expect(client.getIssue).not.toHaveBeenCalled();
      expect(client.setMilestone).not.toHaveBeenCalled();
    });
  });
});
