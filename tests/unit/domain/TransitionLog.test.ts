import { TransitionLog } from '../../../src/domain/dom/TransitionLog';
import { Transition } from '../../../src/domain/dom/Transition';
import { IncompleteTransitionError } from '../../../src/domain/dom/TransitionErrors';

describe('TransitionLog', () => {
  const completed = (element: string, event: string, options: Record<string, unknown> = {}): Transition =>
    Transition.create({ [element]: event }, options).complete();

  const createLog = (): TransitionLog =>
    TransitionLog.create('https://example.com/cart', [
      completed('https://example.com/cart', 'request'),
      completed('page', 'load'),
      completed('#add-item', 'click'),
      completed('#qty', 'change', { value: '2' }),
    ]);

  describe('create', () => {
    it('should hold the transitions in order', () => {
      const log = createLog();

      expect(log.url).toBe('https://example.com/cart');
      expect(log.length).toBe(4);
      expect(log.transitions.map(t => t.event)).toEqual(['request', 'load', 'click', 'change']);
      expect(log.last()?.element).toBe('#qty');
    });

    it('should use a provided ID', () => {
      expect(TransitionLog.create('https://example.com', [], 'log-1').id).toBe('log-1');
    });

    it('should generate an ID otherwise', () => {
      expect(TransitionLog.create('https://example.com').id).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  describe('push', () => {
    it('should append completed transitions', () => {
      const log = TransitionLog.create('https://example.com');

      log.push(completed('#save', 'click')).push(completed('#form', 'submit'));

      expect(log.length).toBe(2);
    });

    it('should reject running transitions', () => {
      const log = TransitionLog.create('https://example.com');

      expect(() => log.push(Transition.create({ '#save': 'click' }))).toThrow(IncompleteTransitionError);
      expect(log.length).toBe(0);
    });

    it('should reject unstarted transitions', () => {
      const log = TransitionLog.create('https://example.com');

      expect(() => log.push(Transition.create())).toThrow(
        "Only completed transitions can be logged: '' on: "
      );
    });

    it('should not be affected by changes to the returned list', () => {
      const log = createLog();

      log.transitions.pop();

      expect(log.length).toBe(4);
    });
  });

  describe('depth', () => {
    it('should sum the depth of every transition', () => {
      // request counts 0, load, click and change count 1 each
      expect(createLog().depth()).toBe(3);
    });

    it('should be 0 for an empty log', () => {
      expect(TransitionLog.create('https://example.com').depth()).toBe(0);
    });
  });

  describe('replayableTransitions', () => {
    it('should leave out request and load', () => {
      expect(createLog().replayableTransitions().map(t => t.element)).toEqual(['#add-item', '#qty']);
    });
  });

  describe('isEquivalentTo', () => {
    it('should ignore identity and timing', () => {
      const log = createLog();
      const other = TransitionLog.create(
        log.url,
        log.transitions.map(t =>
          Transition.fromStructured({
            element: t.element ?? '',
            event: t.event ?? '',
            options: t.options,
            elapsed: 999,
          })
        )
      );

      expect(log.equals(other)).toBe(false);
      expect(log.isEquivalentTo(other)).toBe(true);
    });

    it('should compare transitions whose options hold bigints', () => {
      const log = TransitionLog.create('https://example.com', [completed('#qty', 'change', { value: BigInt(3) })]);
      const other = TransitionLog.create('https://example.com', [completed('#qty', 'change', { value: BigInt(3) })]);

      expect(log.isEquivalentTo(other)).toBe(true);
    });

    it('should differ when a transition differs', () => {
      const log = createLog();
      const other = createLog();
      other.push(completed('#checkout', 'click'));

      expect(log.isEquivalentTo(other)).toBe(false);
    });

    it('should differ by URL', () => {
      const other = TransitionLog.create('https://example.com/other', createLog().transitions);

      expect(createLog().isEquivalentTo(other)).toBe(false);
    });
  });

  describe('duplicate', () => {
    it('should copy the transitions and keep the identity', () => {
      const log = createLog();

      const copy = log.duplicate();
      copy.push(completed('#checkout', 'click'));

      expect(copy.equals(log)).toBe(true);
      expect(copy.length).toBe(5);
      expect(log.length).toBe(4);
      expect(copy.transitions[3]).not.toBe(log.transitions[3]);
    });
  });

  describe('toJSON / fromJSON', () => {
    it('should export the structured transitions', () => {
      const log = TransitionLog.create('https://example.com', [completed('#save', 'click', { value: 'x' })], 'log-1');

      expect(log.toJSON()).toEqual({
        id: 'log-1',
        url: 'https://example.com',
        transitions: [{ element: '#save', event: 'click', options: { value: 'x' }, elapsed: expect.any(Number) }],
      });
    });

    it('should rebuild a log from a record', () => {
      const log = TransitionLog.fromJSON({
        id: 'log-2',
        url: 'https://example.com',
        transitions: [
          { element: 'https://example.com', event: 'request', elapsed: 80 },
          { element: '#save', event: 'click', options: { value: 'x' }, elapsed: 15 },
        ],
      });

      expect(log.id).toBe('log-2');
      expect(log.depth()).toBe(1);
      expect(log.transitions[1].elapsed).toBe(15);
      expect(log.transitions[1].equals(completed('#save', 'click', { value: 'x' }))).toBe(true);
    });
  });

  it('should summarize the path to the page state', () => {
    const log = TransitionLog.create('https://example.com', [
      completed('https://example.com', 'request'),
      completed('#save', 'click'),
    ]);

    expect(log.summarize()).toBe(
      "https://example.com [depth 1]: 'request' on: https://example.com → 'click' on: #save"
    );
  });
});
