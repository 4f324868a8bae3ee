import dayjs from 'dayjs';

function stamp() {
  return `[${dayjs().format('YYYY-MM-DD HH:mm:ss.SSS')}]`;
}

export const log = {
  info(message: string) {
    console.log(`${stamp()} ${message}`);
  },
  warn(message: string) {
    console.warn(`${stamp()} ${message}`);
  },
  error(message: string) {
    console.error(`${stamp()} ${message}`);
  },
};
