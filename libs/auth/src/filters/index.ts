export { AuthExceptionFilter } from './auth-exception.filter';
