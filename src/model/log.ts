import debug from 'debug';

export const log = {
  store: debug('field:store'),
  input: debug('field:input')
};
