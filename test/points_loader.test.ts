import { expect } from 'chai';

import { PointRegistry } from '../lib/pointRegistry';
import {
  groupFailuresByMessage,
  isBlankValue,
  parsePointsCsv,
  parsePresentValue,
  parseStateText,
  registerPoints,
} from '../lib/pointsLoader';

const SAMPLE = [
  'Type,Instance,Name,PresentValue,Override,Description',
  'Analog Input,1,SpaceTemp,72.9 °F,,Zone temperature',
  'Analog Output,2,Damper,45 %,8,Damper command',
  'Binary Output,1,Fan,active,,Supply fan',
  'Multi State Value,1,Mode,[2] Heating,,"[1]=Cooling, [2]=Heating, [3]=Fault"',
  'Bogus,1,X,1,,',
  'Analog Value,abc,Y,1,,',
  'Analog Value,3,Z,hello,,',
  'Analog Value,4,W,1,20,',
  'Analog Input,5,,,,',
  'Analog Input,6,SpaceTemp,70,,',
].join('\n');

describe('points loader', () => {
  describe('value parsing', () => {
    it('reads the numeric part of table values', () => {
      expect(parsePresentValue('[3] Ventilating')).to.equal(3);
      expect(parsePresentValue('-4.5 °C')).to.equal(-4.5);
      expect(parsePresentValue('450 CFM')).to.equal(450);
      expect(parsePresentValue('1e3')).to.equal(1000);
      expect(parsePresentValue('ON')).to.equal(1);
      expect(parsePresentValue('inactive')).to.equal(0);
      expect(parsePresentValue('n/a')).to.equal(null);
    });

    it('treats empty and dash values as blank', () => {
      expect(isBlankValue('')).to.equal(true);
      expect(isBlankValue(' - ')).to.equal(true);
      expect(isBlankValue('—')).to.equal(true);
      expect(isBlankValue('0')).to.equal(false);
    });

    it('reads state names from descriptions', () => {
      expect(parseStateText('Mode [2]=On, [1]=Off')).to.deep.equal(['Off', 'On']);
      expect(parseStateText('Plain description')).to.equal(undefined);
    });
  });

  describe('parsePointsCsv', () => {
    const parsed = parsePointsCsv(SAMPLE);
    const byRow = new Map(parsed.rows.map((row) => [row.row, row.definition]));

    it('builds definitions for valid rows', () => {
      expect(parsed.rows.map((row) => row.row)).to.deep.equal([1, 2, 3, 4, 9, 10]);

      expect(byRow.get(1)).to.deep.equal({
        kind: 'analogInput',
        instance: 1,
        name: 'SpaceTemp',
        initialValue: 72.9,
        description: 'Zone temperature',
        units: 'degreesFahrenheit',
      });
      expect(byRow.get(2)).to.deep.equal({
        kind: 'analogOutput',
        instance: 2,
        name: 'Damper',
        initialValue: 45,
        description: 'Damper command',
        units: 'percent',
        overridePriority: 8,
      });
      expect(byRow.get(3)).to.deep.equal({
        kind: 'binaryOutput',
        instance: 1,
        name: 'Fan',
        initialValue: true,
        description: 'Supply fan',
      });
      expect(byRow.get(4)).to.deep.equal({
        kind: 'multistateValue',
        instance: 1,
        name: 'Mode',
        initialValue: 2,
        description: '[1]=Cooling, [2]=Heating, [3]=Fault',
        stateText: ['Cooling', 'Heating', 'Fault'],
      });
    });

    it('fills blank names and values and keeps names unique', () => {
      expect(byRow.get(9)).to.deep.equal({
        kind: 'analogInput',
        instance: 5,
        name: 'AI5',
        initialValue: 0,
        description: '',
        units: 'noUnits',
      });
      expect(byRow.get(10)?.name).to.equal('SpaceTemp_1');
      expect(byRow.get(10)?.units).to.equal('degreesCelsius');
    });

    it('collects row failures', () => {
      expect(parsed.failures).to.deep.equal([
        {
          row: 5, type: 'Bogus', instance: '1', name: 'X', message: 'Unknown object type "Bogus"',
        },
        {
          row: 6, type: 'Analog Value', instance: 'abc', name: 'Y', message: 'Invalid instance "abc"',
        },
        {
          row: 7, type: 'Analog Value', instance: '3', name: 'Z', message: 'Present value "hello" is not numeric',
        },
        {
          row: 8, type: 'Analog Value', instance: '4', name: 'W', message: 'Override "20" is not a priority in [1, 16]',
        },
      ]);
    });

    it('honours explicit Units and States columns', () => {
      const result = parsePointsCsv([
        'type,instance,name,presentvalue,override,description,units,states',
        'AI,1,Supply,550,,,CFM,',
        'MSV,2,Stage,1,,,,Off|Low|High',
      ].join('\n'));
      expect(result.failures).to.deep.equal([]);
      expect(result.rows[0].definition.units).to.equal('cubicFeetPerMinute');
      expect(result.rows[1].definition.stateText).to.deep.equal(['Off', 'Low', 'High']);
    });
  });

  describe('registerPoints', () => {
    it('registers rows and reports the ones the registry rejects', () => {
      const registry = new PointRegistry();
      registry.define({
        kind: 'analogInput', instance: 1, name: 'Existing', initialValue: 0,
      });

      const report = registerPoints(registry, parsePointsCsv(SAMPLE));
      expect(report.registered).to.equal(5);
      expect(report.failures.map((failure) => failure.row)).to.deep.equal([1, 5, 6, 7, 8]);
      expect(report.failures[0].message).to.equal('DuplicateInstance: analogInput:1 is already registered');

      const damper = registry.find('analogOutput', 2);
      expect(damper.ok && damper.value.resolve()).to.deep.equal({ value: 45, priority: 8 });
    });

    it('raises multistate values below the first state to state 1', () => {
      const registry = new PointRegistry();
      const report = registerPoints(registry, parsePointsCsv([
        'Type,Instance,Name,PresentValue,Override,Description',
        'Multi State Value,1,Mode,0,,',
        'Multistate Input,2,Stage,-2,,',
      ].join('\n')));

      expect(report).to.deep.equal({ registered: 2, failures: [] });
      const mode = registry.find('multistateValue', 1);
      expect(mode.ok && mode.value.resolve()).to.deep.equal({ value: 1, priority: null });
      const stage = registry.find('multistateInput', 2);
      expect(stage.ok && stage.value.effectiveValue).to.equal(1);
    });

    it('groups failures that share a message', () => {
      const registry = new PointRegistry();
      const report = registerPoints(registry, parsePointsCsv([
        'Type,Instance,Name,PresentValue,Override,Description',
        'MSV,1,A,9,,',
        'MSV,2,B,9,,',
        'Bogus,3,C,1,,',
      ].join('\n')));

      const groups = groupFailuresByMessage(report.failures);
      expect(Array.from(groups.keys())).to.deep.equal([
        'InvalidDefinition: initial value rejected: Multistate value must be an integer in [1, 4], got 9',
        'Unknown object type "Bogus"',
      ]);
      expect(groups.get('Unknown object type "Bogus"')?.map((failure) => failure.row)).to.deep.equal([3]);
      expect(Array.from(groups.values())[0].map((failure) => failure.name)).to.deep.equal(['A', 'B']);
    });
  });
});
