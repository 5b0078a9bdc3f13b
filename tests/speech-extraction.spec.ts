import { describe, expect, it } from 'vitest';
import {
  captureFromSpeech,
  extractBareName,
  extractDate,
  extractHospitalId,
  extractPatientName,
  extractRemainingSymptoms,
  extractSymptoms,
  extractTime,
} from '../src/services/speech-extraction.service';

describe('extractPatientName', () => {
  it('reads introductions', () => {
    expect(extractPatientName('My name is John Smith')).toBe('John Smith');
    expect(extractPatientName('john smith is my name')).toBe('John Smith');
    expect(extractPatientName("Patient's name is Maria Lopez")).toBe('Maria Lopez');
  });

  it('stops at the first word that is not part of the name', () => {
    expect(extractPatientName('Hi, my name is Jane Doe and my hospital ID is 2')).toBe('Jane Doe');
    expect(extractPatientName('This is John calling about an appointment')).toBe('John');
  });

  it('ignores phrases that only look like introductions', () => {
    expect(extractPatientName('I am suffering from a headache')).toBeNull();
    expect(extractPatientName('Hospital ID 4')).toBeNull();
  });
});

describe('extractBareName', () => {
  it('accepts a short reply made of words', () => {
    expect(extractBareName('  alex morgan ')).toBe('Alex Morgan');
  });

  it('rejects replies with digits, keywords or too many words', () => {
    expect(extractBareName('hospital two')).toBeNull();
    expect(extractBareName('room 12')).toBeNull();
    expect(extractBareName('one two three four five')).toBeNull();
    expect(extractBareName('')).toBeNull();
  });
});

describe('extractHospitalId', () => {
  it.each([
    ['hospital id 3', 3],
    ['Hospital ID is 12', 12],
    ['hospital number 7', 7],
    ['it is the number 5', 5],
  ])('reads %s', (speech, expected) => {
    expect(extractHospitalId(speech)).toBe(expected);
  });

  it('returns null without a hospital reference', () => {
    expect(extractHospitalId('I have 2 kids')).toBeNull();
  });

  it('ignores numbers outside the hospital ID range', () => {
    expect(extractHospitalId('you can reach me on number 5551234567')).toBeNull();
    expect(extractHospitalId('hospital id 0')).toBeNull();
    expect(extractHospitalId('hospital id 2147483647')).toBe(2147483647);
  });
});

describe('extractDate', () => {
  it('captures the date as spoken', () => {
    expect(extractDate('date 2025-06-15 please')).toBe('2025-06-15');
    expect(extractDate('on 6/15/2025')).toBe('6/15/2025');
    expect(extractDate('On June 15th, 2025 please')).toBe('june 15th, 2025');
  });

  it('returns null when no date is present', () => {
    expect(extractDate('tomorrow morning')).toBeNull();
  });
});

describe('extractTime', () => {
  it('captures clock times and day parts', () => {
    expect(extractTime('time 10:30 AM')).toBe('10:30 am');
    expect(extractTime('at 3 in the afternoon')).toBe('3 in the afternoon');
    expect(extractTime("around 4 o'clock")).toBe("4 o'clock");
  });

  it('does not read a word starting with am as a time', () => {
    expect(extractTime('2 ambulances')).toBeNull();
  });
});

describe('extractSymptoms', () => {
  it('reads the phrase after a symptom marker', () => {
    expect(extractSymptoms('My symptoms are headache and fever')).toBe('headache and fever');
    expect(extractSymptoms('symptoms are headache, date 2025-06-15')).toBe('headache');
    expect(extractSymptoms("I'm suffering from back pain.")).toBe('back pain');
  });

  it('needs a marker word', () => {
    expect(extractSymptoms('I have a cough')).toBeNull();
  });
});

describe('extractRemainingSymptoms', () => {
  it('keeps what is left after known values and stock phrases', () => {
    const draft = { patient: 'Alex Morgan', hospitalId: 2, date: '2025-06-15', time: '3:00 PM' };
    expect(extractRemainingSymptoms('Severe back pain, 3 pm', draft, ['3 pm'])).toBe('Severe back pain');
  });

  it('returns null when three characters or fewer remain', () => {
    const draft = { patient: 'Alex Morgan' };
    expect(extractRemainingSymptoms('my name is Alex Morgan, ok', draft)).toBeNull();
  });
});

describe('captureFromSpeech', () => {
  it('captures every field from a complete utterance', () => {
    const speech = 'My name is Alex Morgan, hospital ID 1, symptoms are headache, date 2025-06-15, time 10:00 AM.';

    expect(captureFromSpeech(speech)).toEqual({
      patient: 'Alex Morgan',
      hospitalId: 1,
      date: '2025-06-15',
      time: '10:00 AM',
      symptoms: 'headache',
    });
  });

  it('takes a bare name only while no patient is known', () => {
    expect(captureFromSpeech('Alex Morgan')).toEqual({ patient: 'Alex Morgan' });
    expect(captureFromSpeech('sounds fine', { patient: 'Alex Morgan' })).toEqual({});
  });

  it('uses the rest of the utterance as symptoms once everything else is known', () => {
    const draft = { patient: 'Alex Morgan', hospitalId: 2, date: '2025-06-15' };

    expect(captureFromSpeech('Severe back pain, 3 pm', draft)).toEqual({
      time: '3:00 PM',
      symptoms: 'Severe back pain',
    });
  });
});
