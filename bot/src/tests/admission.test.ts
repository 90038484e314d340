/**
 * Admission controller: queueing verdicts and accepting under the bot rate limit.
 */

import { describe, test } from 'node:test';
import assert from 'node:assert';

import type { DeclineReason } from '../../../shared/types/decline.js';
import { ChallengeAdmission, type AcceptHandlers } from '../admission.js';
import type { Challenge } from '../challenge.js';
import { RecordValidationError } from '../validation.js';
import { FakeClock, OWN_USERNAME, botProfile, challengeRecord, makePolicy } from './fixtures.js';

// -----------------------------------------------------------------------------
// Test Utilities
// -----------------------------------------------------------------------------

interface RecordingHandlers extends AcceptHandlers {
  accepted: string[];
  declined: Array<[string, DeclineReason]>;
}

function recordingHandlers(): RecordingHandlers {
  const accepted: string[] = [];
  const declined: Array<[string, DeclineReason]> = [];
  return {
    accepted,
    declined,
    async accept(challenge: Challenge) {
      // Yield so concurrent acceptances actually interleave
      await new Promise<void>((resolve) => setImmediate(resolve));
      accepted.push(challenge.id);
    },
    async decline(challenge: Challenge, reason: DeclineReason) {
      declined.push([challenge.id, reason]);
    },
  };
}

function makeAdmission(policyOverrides: Record<string, unknown> = {}, clock = new FakeClock()) {
  return new ChallengeAdmission({
    username: OWN_USERNAME,
    policy: makePolicy(policyOverrides),
    clock: clock.now,
  });
}

// -----------------------------------------------------------------------------
// consider()
// -----------------------------------------------------------------------------

describe('ChallengeAdmission.consider', () => {
  test('accepted challenge is queued', () => {
    const admission = makeAdmission();
    const decision = admission.consider(challengeRecord());

    assert.strictEqual(decision.accepted, true);
    assert.strictEqual(decision.reason, '');
    assert.strictEqual(decision.message, '');
    assert.strictEqual(decision.challenge.id, 'c1');
    assert.strictEqual(admission.queue.size, 1);
  });

  test('declined challenge carries a message and is not queued', () => {
    const admission = makeAdmission();
    const decision = admission.consider(challengeRecord({ variant: { key: 'atomic' } }));

    assert.strictEqual(decision.accepted, false);
    assert.strictEqual(decision.reason, 'variant');
    assert.strictEqual(decision.message, 'This variant is not accepted.');
    assert.strictEqual(admission.queue.size, 0);
  });

  test('own challenge is accepted but never queued', () => {
    const admission = makeAdmission();
    const decision = admission.consider(challengeRecord({ challenger: { name: OWN_USERNAME } }));

    assert.strictEqual(decision.accepted, true);
    assert.strictEqual(admission.queue.size, 0);
  });

  test('a repeated challenge is queued once and the log shows the real count', (t) => {
    const out = t.mock.method(console, 'log', (..._line: unknown[]) => {});
    const admission = makeAdmission();
    admission.consider(challengeRecord());
    admission.consider(challengeRecord());

    assert.strictEqual(admission.queue.size, 1);
    assert.strictEqual(
      out.mock.calls[1].arguments[0],
      '[Admission] Queued Blitz rated challenge from carol (1800) (c1) {"score":2000,"queued":1}',
    );
  });

  test('malformed payload throws', () => {
    const admission = makeAdmission();
    assert.throws(() => admission.consider({ rated: true }), RecordValidationError);
  });

  test('cancel removes a queued challenge', () => {
    const admission = makeAdmission();
    admission.consider(challengeRecord());
    assert.strictEqual(admission.cancel('c1'), true);
    assert.strictEqual(admission.queue.isEmpty(), true);
  });
});

// -----------------------------------------------------------------------------
// acceptNext()
// -----------------------------------------------------------------------------

describe('ChallengeAdmission.acceptNext', () => {
  test('accepts the best queued challenge first', async () => {
    const admission = makeAdmission();
    admission.consider(challengeRecord({ id: 'weak', challenger: { name: 'dave', rating: 1200 } }));
    admission.consider(challengeRecord({ id: 'strong', challenger: { name: 'erin', rating: 2100 } }));

    const handlers = recordingHandlers();
    const outcome = await admission.acceptNext(handlers);

    assert.deepStrictEqual(
      outcome && { accepted: outcome.accepted, id: outcome.challenge.id },
      { accepted: true, id: 'strong' },
    );
    assert.deepStrictEqual(handlers.accepted, ['strong']);
  });

  test('empty queue returns undefined', async () => {
    assert.strictEqual(await makeAdmission().acceptNext(recordingHandlers()), undefined);
  });

  test('human acceptances are not recorded', async () => {
    const admission = makeAdmission({ maxRecentBotChallenges: 1 });
    admission.consider(challengeRecord());
    await admission.acceptNext(recordingHandlers());
    assert.strictEqual(admission.tracker.size, 0);
  });

  test('concurrent acceptances from one bot respect the limit', async () => {
    const admission = makeAdmission({ maxRecentBotChallenges: 1 });
    admission.consider(challengeRecord({ id: 'b1', challenger: botProfile('bot1') }));
    admission.consider(challengeRecord({ id: 'b2', challenger: botProfile('bot1') }));
    assert.strictEqual(admission.queue.size, 2);

    const handlers = recordingHandlers();
    const outcomes = await Promise.all([admission.acceptNext(handlers), admission.acceptNext(handlers)]);

    assert.deepStrictEqual(
      outcomes.map((o) => o && [o.challenge.id, o.accepted]),
      [
        ['b1', true],
        ['b2', false],
      ],
    );
    assert.deepStrictEqual(handlers.accepted, ['b1']);
    assert.deepStrictEqual(handlers.declined, [['b2', 'later']]);
    assert.strictEqual(admission.tracker.count('bot1'), 1);
  });

  test('bot is welcome again once the window passes', async () => {
    const clock = new FakeClock();
    const admission = makeAdmission({ maxRecentBotChallenges: 1, recentBotChallengeAgeSeconds: 60 }, clock);

    admission.consider(challengeRecord({ id: 'b1', challenger: botProfile('bot1') }));
    await admission.acceptNext(recordingHandlers());

    const tooSoon = admission.consider(challengeRecord({ id: 'b2', challenger: botProfile('bot1') }));
    assert.strictEqual(tooSoon.reason, 'later');
    assert.strictEqual(tooSoon.message, "I'm not accepting challenges right now, please ask again later.");

    clock.advance(60_000);
    const later = admission.consider(challengeRecord({ id: 'b3', challenger: botProfile('bot1') }));
    assert.strictEqual(later.accepted, true);
  });

  test('failed accept is not recorded and the error propagates', async () => {
    const admission = makeAdmission({ maxRecentBotChallenges: 1 });
    admission.consider(challengeRecord({ id: 'b1', challenger: botProfile('bot1') }));

    const failing: AcceptHandlers = {
      async accept() {
        throw new Error('server said no');
      },
      async decline() {},
    };
    await assert.rejects(admission.acceptNext(failing), /server said no/);
    assert.strictEqual(admission.tracker.count('bot1'), 0);
  });
});

// -----------------------------------------------------------------------------
// Sweeper
// -----------------------------------------------------------------------------

describe('ChallengeAdmission sweeper', () => {
  test('does not start without an interval', () => {
    const admission = makeAdmission();
    assert.strictEqual(admission.startSweeper(), false);
  });

  test('starts from the configured interval and stops', () => {
    const admission = makeAdmission({ sweepIntervalMs: 1000 });
    assert.strictEqual(admission.startSweeper(), true);
    admission.stop();
  });
});
