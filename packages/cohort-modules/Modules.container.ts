import 'reflect-metadata';
import { Container } from 'inversify';

let container = new Container();
export { container };
