import { mountFieldApp } from './bootstrap';
import { optionsFromEnv } from './model/config';
import './styles.css';

const container = document.getElementById('root');
if (!container) {
  throw new Error('Missing #root element.');
}

mountFieldApp(container, optionsFromEnv(import.meta.env));
