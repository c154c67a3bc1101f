import { describe, it, expect } from 'vitest';
import { parseInstallerConfig, validateInstallerConfig } from '../parser.js';
import { ConfigParseError } from '../schema.js';

describe('Config Parser', () => {
  describe('parseInstallerConfig', () => {
    it('should parse welcome page text', () => {
      const yaml = `
welcome_page:
  logo: /usr/share/pixmaps/test-logo.png
  text: Welcome
  usage: yes
`;

      const config = parseInstallerConfig(yaml);

      expect(config.welcome_page?.text).toBe('Welcome');
    });

    it('should keep keys it does not translate', () => {
      const yaml = `
distribution_name: 'Test OS'
minimum_disk_size: 64
`;

      const config = parseInstallerConfig(yaml);

      expect(config.distribution_name).toBe('Test OS');
      expect(config.minimum_disk_size).toBe(64);
      expect(config.desktop).toBeUndefined();
    });

    it('should accept a YAML 1.2 directive', () => {
      const yaml = `%YAML 1.2
---
welcome_page:
  text: Hello
`;

      expect(parseInstallerConfig(yaml).welcome_page?.text).toBe('Hello');
    });

    it('should parse desktops and choices with options', () => {
      const yaml = `
desktop:
  - name: GNOME
    description: A desktop
additional_software:
  - name: Office
    options:
      - name: LibreOffice
        option: libreoffice
`;

      const config = parseInstallerConfig(yaml);

      expect(config.desktop).toHaveLength(1);
      expect(config.desktop?.[0].name).toBe('GNOME');
      expect(config.additional_software?.[0].options?.[0].option).toBe('libreoffice');
    });

    it('should accept sections left empty', () => {
      const yaml = `
desktop:
additional_features:
`;

      const config = parseInstallerConfig(yaml);

      expect(config.desktop).toBeNull();
      expect(config.additional_features).toBeNull();
    });

    it('should throw for a file with only comments', () => {
      expect(() => parseInstallerConfig('# nothing here\n')).toThrow(
        'Config file is empty or contains only comments'
      );
    });

    it('should throw ConfigParseError for malformed YAML', () => {
      expect(() => parseInstallerConfig('welcome_page: [unclosed\n')).toThrow(ConfigParseError);
    });

    it('should throw ConfigParseError when a section has the wrong shape', () => {
      try {
        parseInstallerConfig('desktop: GNOME\n');
        expect.unreachable('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigParseError);
        if (error instanceof ConfigParseError) {
          expect(error.message).toBe('Config validation failed');
          expect(error.getDetails()).toBe('desktop: Expected array, received string');
        }
      }
    });

    it('should throw when the document is a list', () => {
      expect(() => parseInstallerConfig('- one\n- two\n')).toThrow(ConfigParseError);
    });
  });

  describe('validateInstallerConfig', () => {
    it('should validate an already parsed object', () => {
      const config = validateInstallerConfig({ welcome_page: { text: 'Hi' } });

      expect(config.welcome_page?.text).toBe('Hi');
    });

    it('should reject options that are not mappings', () => {
      expect(() =>
        validateInstallerConfig({ additional_features: [{ name: 'A', options: ['x'] }] })
      ).toThrow(ConfigParseError);
    });
  });
});
