import { IntentClassifierService } from './intent-classifier.service';

describe('IntentClassifierService', () => {
  const classifier = new IntentClassifierService();

  it.each([
    ['Hello!', 'casual'],
    ['good morning, how are you?', 'casual'],
    ['thanks a lot', 'casual'],
    ['who are you?', 'casual'],
    ['', 'casual'],
  ])('treats %p as casual', (message, expected) => {
    expect(classifier.classify(message)).toBe(expected);
  });

  it('does not treat a greeting with legal vocabulary as casual', () => {
    expect(classifier.classify('Hi, what does section 420 IPC say?')).toBe('general');
  });

  it.each([
    'Can my landlord evict me without notice?',
    'is dowry demand punishable?',
    'what a lovely day',
  ])('routes the short non-greeting %p to general', (message) => {
    expect(classifier.classify(message)).toBe('general');
  });

  it('routes long greetings to retrieval', () => {
    const message = 'hello, my landlord changed the locks while I was away visiting my family';
    expect(classifier.classify(message)).toBe('general');
  });

  it('routes long messages without legal vocabulary to retrieval', () => {
    const message = 'my neighbour keeps parking his truck in front of my gate every single night';
    expect(classifier.classify(message)).toBe('general');
  });

  it('detects summarize_case when both case and summarize appear', () => {
    expect(classifier.classify('Please summarize the Kesavananda case')).toBe('summarize_case');
    expect(classifier.classify('summarise these cases for me')).toBe('summarize_case');
  });

  it('detects search_case from case or judgment', () => {
    expect(classifier.classify('find a case about dowry harassment')).toBe('search_case');
    expect(classifier.classify('latest Supreme Court judgment on bail')).toBe('search_case');
    expect(classifier.classify('any judgement on anticipatory bail?')).toBe('search_case');
  });

  it('detects summarize without a case', () => {
    expect(classifier.classify('summarize: The accused was granted bail.')).toBe('summarize');
  });

  it('does not match case inside longer words', () => {
    expect(classifier.classify('is a bookcase covered under property law')).toBe('general');
  });

  it('isLegal uses vocabulary or length', () => {
    expect(classifier.isLegal('bail conditions')).toBe(true);
    expect(classifier.isLegal('nice weather today')).toBe(false);
  });
});
