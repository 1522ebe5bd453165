/**
 * HotkeyManager Unit Tests
 *
 * Tests trigger-key handling:
 * - Hold mode down/up edges
 * - Key-repeat suppression and unmatched key-ups
 * - Toggle mode
 * - Live re-binding
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EventBus, type BusEvent } from '../../src/main/EventBus.js';
import { HotkeyManager } from '../../src/main/HotkeyManager.js';
import type { SessionKind } from '../../src/shared/types.js';
import { FakeKeySource, fakeSettings } from '../helpers/fakes.js';

function edges(events: BusEvent[]): string[] {
  return events.map((event) => `${event.type}:${event.kind}`);
}

describe('HotkeyManager', () => {
  let bus: EventBus;
  let source: FakeKeySource;
  let posted: BusEvent[];

  beforeEach(() => {
    bus = new EventBus();
    source = new FakeKeySource();
    posted = [];
    bus.subscribe((event) => posted.push(event));
  });

  // ===========================================================================
  // Hold mode
  // ===========================================================================

  describe('hold mode', () => {
    let manager: HotkeyManager;

    beforeEach(() => {
      manager = new HotkeyManager({ source, bus, settings: fakeSettings() });
      manager.start();
    });

    afterEach(() => {
      manager.stop();
    });

    it('starts the key source', () => {
      expect(source.started).toBe(true);
    });

    it('posts down on press and up on release for the bound track', () => {
      source.press('AltRight');
      source.release('AltRight');
      source.press('CtrlRight');
      source.release('CtrlRight');

      expect(edges(posted)).toEqual([
        'hotkey:down:dictation',
        'hotkey:up:dictation',
        'hotkey:down:assistant',
        'hotkey:up:assistant',
      ]);
    });

    it('suppresses key repeat while the key is held', () => {
      source.press('AltRight');
      source.press('AltRight');
      source.press('AltRight');
      source.release('AltRight');

      expect(edges(posted)).toEqual(['hotkey:down:dictation', 'hotkey:up:dictation']);
    });

    it('ignores a key-up without a matching key-down', () => {
      source.release('AltRight');
      expect(posted).toEqual([]);
    });

    it('ignores keys that are not bound', () => {
      source.press('F9');
      source.release('F9');
      expect(posted).toEqual([]);
    });

    it('keeps both tracks independent', () => {
      source.press('AltRight');
      source.press('CtrlRight');
      source.release('AltRight');
      source.release('CtrlRight');

      expect(edges(posted)).toEqual([
        'hotkey:down:dictation',
        'hotkey:down:assistant',
        'hotkey:up:dictation',
        'hotkey:up:assistant',
      ]);
    });

    it('forgets held keys on releaseAll so the next press counts', () => {
      source.press('AltRight');
      manager.releaseAll();
      source.press('AltRight');

      expect(edges(posted)).toEqual(['hotkey:down:dictation', 'hotkey:down:dictation']);
    });

    it('notifies onHotkey subscribers', () => {
      const received: Array<[SessionKind, string]> = [];
      const unsubscribe = manager.onHotkey((kind, edge) => received.push([kind, edge]));

      source.press('CtrlRight');
      unsubscribe();
      source.release('CtrlRight');

      expect(received).toEqual([['assistant', 'down']]);
    });

    it('stops listening after stop()', () => {
      manager.stop();
      source.press('AltRight');
      expect(posted).toEqual([]);
      expect(source.started).toBe(false);
    });
  });

  // ===========================================================================
  // Toggle mode
  // ===========================================================================

  describe('toggle mode', () => {
    it('posts down on the first press and up on the second, ignoring releases', () => {
      const manager = new HotkeyManager({ source, bus, settings: fakeSettings({ recordingMode: 'toggle' }) });
      manager.start();

      source.press('AltRight');
      source.release('AltRight');
      source.press('AltRight');
      source.release('AltRight');

      expect(edges(posted)).toEqual(['hotkey:down:dictation', 'hotkey:up:dictation']);
    });

    it('asks the capture probe which edge to post', () => {
      let capturing = false;
      const manager = new HotkeyManager({
        source,
        bus,
        settings: fakeSettings({ recordingMode: 'toggle' }),
        isCapturing: () => capturing,
      });
      manager.start();

      source.press('AltRight');
      source.release('AltRight');
      // Capture never started (e.g. microphone busy): the next press starts again
      source.press('AltRight');
      source.release('AltRight');
      capturing = true;
      source.press('AltRight');

      expect(edges(posted)).toEqual(['hotkey:down:dictation', 'hotkey:down:dictation', 'hotkey:up:dictation']);
    });
  });

  // ===========================================================================
  // Bindings
  // ===========================================================================

  describe('bindings', () => {
    it('reads the keys from settings', () => {
      const manager = new HotkeyManager({
        source,
        bus,
        settings: fakeSettings({ dictationKey: 'F9', assistantKey: 'F10' }),
      });
      expect(manager.getBindings()).toEqual({ dictation: 'F9', assistant: 'F10' });
    });

    it('re-binds live with updateBindings', () => {
      const manager = new HotkeyManager({ source, bus, settings: fakeSettings() });
      manager.start();

      expect(manager.updateBindings({ dictation: 'F9' })).toEqual({ dictation: 'F9', assistant: 'CtrlRight' });

      source.press('AltRight');
      source.press('F9');

      expect(edges(posted)).toEqual(['hotkey:down:dictation']);
    });

    it('keeps the key for dictation when both tracks are bound to it', () => {
      const manager = new HotkeyManager({
        source,
        bus,
        settings: fakeSettings({ dictationKey: 'F9', assistantKey: 'F9' }),
      });
      manager.start();

      source.press('F9');
      expect(edges(posted)).toEqual(['hotkey:down:dictation']);
    });
  });
});
