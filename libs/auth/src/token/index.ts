export { TokenCodec } from './token-codec.service';
