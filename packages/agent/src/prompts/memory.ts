export interface MemoryPromptInput {
  existingFacts: string[];
}

function formatExistingFacts(facts: string[]): string {
  if (facts.length === 0) {
    return '(none)';
  }

  return facts.map((fact) => `- ${fact}`).join('\n');
}

export function buildMemorySystemPrompt(input: MemoryPromptInput): string {
  return [
    'You are a memory extraction system. Identify stable personal information about the user worth remembering.',
    'You must call the tool `record_memory_decision` exactly once.',
    '',
    'Current user details:',
    formatExistingFacts(input.existingFacts),
    '',
    'Extract:',
    '- identity: name, age, location, occupation',
    '- professional: job title, company, industry, career goals',
    '- interests: hobbies, favourite things, preferences',
    '- life events: ongoing projects, important milestones',
    '- relationships: family, pets, significant connections',
    '- goals: what they want to achieve, learn or do',
    '',
    'Do not extract:',
    '- temporary states ("I am tired", "I am working now")',
    '- questions ("What is the weather?")',
    '- opinions about current topics',
    '- greetings and small talk ("Hello", "Thanks")',
    '- anything already listed in current user details',
    '',
    'Decision rules:',
    '- New stable personal information: should_write=true with one short fact per item, is_new=true.',
    '- Information already in current user details: is_new=false.',
    '- Nothing worth remembering: should_write=false with an empty memories list.',
    '- Be specific: prefer "Plays tennis every weekend" over "Likes sports".',
    '',
    'Example: "Hi, my name is Alice and I am a software engineer" gives should_write=true,',
    'memories=[{text: "Name is Alice", is_new: true}, {text: "Works as a software engineer", is_new: true}].',
    'Example: "My name is Alice" when "Name is Alice" is already stored gives should_write=false, memories=[].',
  ].join('\n');
}

export function buildMemoryUserPrompt(latestMessage: string): string {
  return ['Analyze the latest user message and record the decision.', `user_text: ${latestMessage}`].join('\n');
}
