import test from 'node:test';
import assert from 'node:assert/strict';

import {
  AlreadyRegisteredError,
  ContractMismatchError,
  Registry,
  collectMarkers,
  defineContract,
  implementation,
  isImplementationMarker,
  lifecycleFromFlags,
  IMPLEMENTATION_MARKER,
  type ImplementationMarker,
} from '../../src/index.js';

interface Mailer {
  send(to: string): string;
}

interface Cache {
  get(key: string): string | undefined;
}

const MailerContract = defineContract<Mailer>('Mailer', { methods: ['send'] });
const CacheContract = defineContract<Cache>('Cache', { methods: ['get'] });

let mailerInstances = 0;

class SmtpMailer implements Mailer {
  constructor() {
    mailerInstances++;
  }
  send(to: string) {
    return `sent:${to}`;
  }
}

class MemoryCache implements Cache {
  get(key: string) {
    return key === 'k' ? 'v' : undefined;
  }
}

interface Clock {
  now(): number;
}

interface Greeter {
  greet(): string;
}

const ClockContract = defineContract<Clock>('Clock', { methods: ['now'] });
const GreeterContract = defineContract<Greeter>('Greeter', { methods: ['greet'] });

class FixedClock implements Clock {
  now() {
    return 1;
  }
}

class NotACache {
  fetch() {
    return null;
  }
}

test('lifecycleFromFlags: maps constructEagerly/singleInstance to a lifecycle', () => {
  assert.equal(lifecycleFromFlags(), 'eager');
  assert.equal(lifecycleFromFlags({ constructEagerly: true, singleInstance: true }), 'eager');
  assert.equal(lifecycleFromFlags({ constructEagerly: false }), 'lazy');
  assert.equal(lifecycleFromFlags({ singleInstance: false }), 'factory');
  assert.equal(lifecycleFromFlags({ constructEagerly: true, singleInstance: false }), 'factory');
});

test('implementation: creates a recognizable marker', () => {
  const marker = implementation(MailerContract, SmtpMailer, { constructEagerly: false });
  assert.equal(isImplementationMarker(marker), true);
  assert.equal(marker.lifecycle, 'lazy');
  assert.equal(marker.contract, MailerContract);
  assert.equal(isImplementationMarker({ contract: MailerContract, implementation: SmtpMailer }), false);
  assert.equal(isImplementationMarker(null), false);
});

test('isImplementationMarker: rejects a contract without a methods list', () => {
  const handWritten = {
    [IMPLEMENTATION_MARKER]: true,
    contract: { name: 'Cache' },
    implementation: MemoryCache,
    lifecycle: 'eager',
  };
  assert.equal(isImplementationMarker(handWritten), false);
  assert.throws(() => collectMarkers([handWritten]), TypeError);
});

test('collectMarkers: rejects values that are not markers', () => {
  assert.deepEqual(collectMarkers(undefined), []);
  assert.throws(() => collectMarkers([{}]), TypeError);
});

test('Registry.init(true): registers markers with their lifecycles', () => {
  mailerInstances = 0;
  const reg = new Registry({
    discovery: () => [
      implementation(MailerContract, SmtpMailer, { constructEagerly: false }),
      implementation(CacheContract, MemoryCache, { singleInstance: false }),
    ],
  });
  reg.init();

  assert.equal(reg.isRegistered(MailerContract), true);
  assert.equal(reg.isRegistered(CacheContract), true);
  assert.equal(mailerInstances, 0);

  const mailer = reg.resolve(MailerContract);
  assert.equal(mailer.send('a@example.test'), 'sent:a@example.test');
  assert.equal(reg.resolve(MailerContract), mailer);
  assert.equal(mailerInstances, 1);

  assert.notEqual(reg.resolve(CacheContract), reg.resolve(CacheContract));
  assert.equal(reg.resolve(CacheContract).get('k'), 'v');
});

test('Registry.init(true): eager markers are constructed during init', () => {
  mailerInstances = 0;
  const reg = new Registry({ discovery: [implementation(MailerContract, SmtpMailer)] });
  reg.init(true);
  assert.equal(mailerInstances, 1);
  reg.resolve(MailerContract);
  assert.equal(mailerInstances, 1);
});

test('Registry.init(false): skips the discovery source', () => {
  const reg = new Registry({ discovery: [implementation(MailerContract, SmtpMailer)] });
  reg.init(false);
  assert.equal(reg.isRegistered(MailerContract), false);
});

test('Registry.init(true): a class missing contract methods aborts the whole scan', () => {
  mailerInstances = 0;
  // Shaped like a marker read from untyped module exports.
  const mismatchedMarker: ImplementationMarker = {
    [IMPLEMENTATION_MARKER]: true,
    contract: CacheContract,
    implementation: NotACache,
    lifecycle: 'eager',
  };
  const reg = new Registry({
    discovery: [
      implementation(MailerContract, SmtpMailer),
      mismatchedMarker,
    ],
  });

  assert.throws(
    () => reg.init(),
    (e: unknown) =>
      e instanceof ContractMismatchError &&
      e.message === 'The class NotACache does not implement Cache. (missing: get)' &&
      e.implementation === 'NotACache',
  );
  assert.equal(reg.initialized, true);
  assert.equal(reg.isRegistered(MailerContract), false);
  assert.equal(reg.isRegistered(CacheContract), false);
  assert.equal(mailerInstances, 0);
});

test('Registry.init(true): duplicate contracts in one batch fail with AlreadyRegisteredError', () => {
  const reg = new Registry({
    discovery: [implementation(CacheContract, MemoryCache), implementation(CacheContract, MemoryCache)],
  });
  assert.throws(() => reg.init(), AlreadyRegisteredError);
  assert.equal(reg.isRegistered(CacheContract), false);
});

test('Registry.init(true): a failing eager constructor leaves the batch uninserted', () => {
  class BrokenCache implements Cache {
    constructor() {
      throw new Error('no backend');
    }
    get() {
      return undefined;
    }
  }

  const reg = new Registry({
    discovery: [implementation(MailerContract, SmtpMailer, { constructEagerly: false }), implementation(CacheContract, BrokenCache)],
  });
  assert.throws(() => reg.init(), /Failed to activate Cache: no backend/);
  assert.equal(reg.isRegistered(MailerContract), false);
  assert.deepEqual(reg.contracts(), []);
});

test('Registry.init(true): an eager marker can resolve a contract discovered earlier in the batch', () => {
  const reg: Registry = new Registry({
    discovery: () => [
      implementation(ClockContract, FixedClock, { constructEagerly: false }),
      implementation(GreeterContract, ClockGreeter),
    ],
  });
  class ClockGreeter implements Greeter {
    private readonly clock = reg.resolve(ClockContract);
    greet() {
      return `t=${this.clock.now()}`;
    }
  }

  reg.init(true);
  assert.equal(reg.resolve(GreeterContract).greet(), 't=1');
  assert.deepEqual(reg.contracts(), ['Clock', 'Greeter']);
});

test('Registry.init(true): a later failure removes entries the batch already inserted', () => {
  class BrokenCache implements Cache {
    constructor() {
      throw new Error('no backend');
    }
    get() {
      return undefined;
    }
  }

  const reg: Registry = new Registry({
    discovery: () => [
      implementation(ClockContract, FixedClock, { constructEagerly: false }),
      implementation(GreeterContract, ClockGreeter),
      implementation(CacheContract, BrokenCache),
    ],
  });
  class ClockGreeter implements Greeter {
    private readonly clock = reg.resolve(ClockContract);
    greet() {
      return `t=${this.clock.now()}`;
    }
  }

  assert.throws(() => reg.init(), /Failed to activate Cache: no backend/);
  assert.equal(reg.initialized, true);
  assert.deepEqual(reg.contracts(), []);
  assert.equal(reg.register(ClockContract, () => new FixedClock()), true);
});

test('Registry.init(true): an eager constructor registering a later batch contract fails the batch', () => {
  const reg = new Registry({
    discovery: () => [implementation(GreeterContract, SelfWiringGreeter), implementation(ClockContract, FixedClock)],
  });
  class SelfWiringGreeter implements Greeter {
    constructor() {
      reg.registerInstance(ClockContract, new FixedClock());
    }
    greet() {
      return 'hi';
    }
  }

  assert.throws(() => reg.init(), AlreadyRegisteredError);
  assert.equal(reg.isRegistered(GreeterContract), false);
  assert.equal(reg.isRegistered(ClockContract), true);
});
