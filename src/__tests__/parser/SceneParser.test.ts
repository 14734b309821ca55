import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  parseScenes,
  formatSceneSeparator,
  sceneDuration,
  sceneAt,
} from '../../parser/SceneParser';

describe('SceneParser', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('parseScenes', () => {
    it('should read a single block', () => {
      const scenes = parseScenes('--- [00:00:00.000 -> 00:00:05.000] ---\nhello\nworld\n');

      expect(scenes).toHaveLength(1);
      expect(scenes[0].startTime).toBe(0);
      expect(scenes[0].endTime).toBe(5);
      expect(scenes[0].content).toBe('hello\nworld');
      expect(scenes[0].line).toBe(1);
    });

    it('should accept loose spacing and longer dashes', () => {
      const scenes = parseScenes('-----[00:00:01.000->00:00:02.000]-----\ntext');

      expect(scenes).toHaveLength(1);
      expect(scenes[0].startTime).toBe(1);
      expect(scenes[0].endTime).toBe(2);
    });

    it('should end a block at the next separator', () => {
      const body = [
        '--- [00:00:00.000 -> 00:00:05.000] ---',
        'first',
        '--- [00:00:05.000 -> 00:00:09.000] ---',
        'second',
      ].join('\n');

      const scenes = parseScenes(body);

      expect(scenes.map((s) => s.content)).toEqual(['first', 'second']);
      expect(scenes.map((s) => s.line)).toEqual([1, 3]);
    });

    it('should end a block at a command line', () => {
      const body = [
        '--- [00:00:00.000 -> 00:00:05.000] ---',
        'Cut to the chase',
        'CUT 00:00:02.000',
        'after the command',
      ].join('\n');

      const [scene] = parseScenes(body);

      expect(scene.content).toBe('Cut to the chase');
    });

    it('should number lines relative to the whole document', () => {
      const scenes = parseScenes('--- [00:00:00.000 -> 00:00:05.000] ---\nhi', { lineOffset: 3 });

      expect(scenes[0].line).toBe(4);
      expect(scenes[0].freeText).toEqual([{ text: 'hi', line: 5 }]);
    });

    it('should allow empty content and zero-length blocks', () => {
      const [scene] = parseScenes('--- [00:00:03.000 -> 00:00:03.000] ---\n\n');

      expect(scene.content).toBe('');
      expect(scene.freeText).toEqual([]);
      expect(sceneDuration(scene)).toBe(0);
    });

    it('should skip a block that ends before it starts and keep scanning', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const body = [
        '--- [00:00:09.000 -> 00:00:01.000] ---',
        'broken',
        '--- [00:00:10.000 -> 00:00:12.000] ---',
        'fine',
      ].join('\n');

      const scenes = parseScenes(body);

      expect(scenes).toHaveLength(1);
      expect(scenes[0].content).toBe('fine');
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it('should split content into title, subtitle and free text', () => {
      const body = [
        '--- [00:00:10.000 -> 00:00:20.000] ---',
        '# Opening',
        '> first line',
        '> second line',
        'Narration starts',
        'and continues',
        '',
        'Second paragraph',
      ].join('\n');

      const [scene] = parseScenes(body);

      expect(scene.title).toBe('Opening');
      expect(scene.subtitle).toBe('first line\nsecond line');
      expect(scene.freeText).toEqual([
        { text: 'Narration starts\nand continues', line: 5 },
        { text: 'Second paragraph', line: 8 },
      ]);
      expect(scene.content).toBe(
        '# Opening\n> first line\n> second line\nNarration starts\nand continues\n\nSecond paragraph'
      );
    });

    it('should treat later headings as free text', () => {
      const [scene] = parseScenes('--- [00:00:00.000 -> 00:00:01.000] ---\n# One\n# Two');

      expect(scene.title).toBe('One');
      expect(scene.freeText).toEqual([{ text: 'Two', line: 3 }]);
    });
  });

  describe('helpers', () => {
    it('should format a separator that parses back', () => {
      const separator = formatSceneSeparator(61.5, 75);

      expect(separator).toBe('--- [00:01:01.500 -> 00:01:15.000] ---');
      expect(parseScenes(separator)[0].startTime).toBe(61.5);
    });

    it('should find the scene covering a time', () => {
      const scenes = parseScenes(
        '--- [00:00:00.000 -> 00:00:05.000] ---\na\n--- [00:00:05.000 -> 00:00:10.000] ---\nb'
      );

      expect(sceneAt(scenes, 2)?.content).toBe('a');
      expect(sceneAt(scenes, 5)?.content).toBe('a');
      expect(sceneAt(scenes, 7)?.content).toBe('b');
      expect(sceneAt(scenes, 11)).toBeUndefined();
    });
  });
});
