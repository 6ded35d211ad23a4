import inquirer from 'inquirer';
import type { Config } from '../config/validator';
import type { DeepPartial } from '../config/loader';

interface PromptAnswers {
  tavilyApiKey?: string;
  groqApiKey?: string;
  groqModel?: string;
}

export const GROQ_MODEL_CHOICES = ['llama-3.3-70b-versatile', 'llama-3.1-8b-instant', 'gemma2-9b-it'];

export const promptForConfig = async (): Promise<DeepPartial<Config>> => {
  const answers = (await inquirer.prompt([
    {
      type: 'password',
      name: 'tavilyApiKey',
      message: 'Enter your Tavily API Key:',
      mask: '*',
      validate: (input: string) => input.length > 0 || 'Tavily API Key is required',
    },
    {
      type: 'password',
      name: 'groqApiKey',
      message: 'Enter your Groq API Key:',
      mask: '*',
      validate: (input: string) => input.length > 0 || 'Groq API Key is required',
    },
    {
      type: 'list',
      name: 'groqModel',
      message: 'Select Groq Model:',
      choices: GROQ_MODEL_CHOICES,
      default: GROQ_MODEL_CHOICES[0],
    },
  ])) as PromptAnswers;

  return {
    tavily: { api_key: answers.tavilyApiKey || '' },
    groq: { api_key: answers.groqApiKey || '', model: answers.groqModel },
  };
};
